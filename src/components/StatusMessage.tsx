import React from "react";
import {Text} from "ink";

interface StatusMessageProps {
  variant: "info" | "warning" | "error";
  message: string;
  hint?: string;
}

export function StatusMessage({variant, message, hint}: StatusMessageProps) {
  const suffix = hint ? ` ${hint}` : "";

  if (variant === "warning") {
    return <Text color="yellow">{`Warning: ${message}${suffix}`}</Text>;
  }

  if (variant === "error") {
    return <Text color="red">{`✖ ${message}${suffix}`}</Text>;
  }

  return <Text color="cyan">{`${message}${suffix}`}</Text>;
}
