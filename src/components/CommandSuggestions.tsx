import React from "react";
import {Box, Text} from "ink";

import {layoutSuggestions, type CommandOption} from "../utils/commands.js";

interface CommandSuggestionsProps {
  suggestions: CommandOption[];
  selectedIndex: number;
}

export function CommandSuggestions({suggestions, selectedIndex}: CommandSuggestionsProps) {
  if (suggestions.length === 0) {
    return null;
  }

  return (
    <Box flexDirection="column" marginBottom={1} borderStyle="round" borderColor="gray" paddingX={1}>
      {layoutSuggestions(suggestions, selectedIndex).map((row) => (
        <Box key={row.option.command} flexDirection="column">
          {row.heading && (
            <Text color="gray" dimColor>
              {row.heading}
            </Text>
          )}
          <Box>
            <Text color={row.selected ? "cyan" : "white"} bold={row.selected}>
              {row.selected ? "› " : "  "}
              {row.label}
            </Text>
            <Text color="gray">  {row.option.description}</Text>
          </Box>
        </Box>
      ))}
    </Box>
  );
}
