import React, {useCallback, useEffect, useMemo, useRef, useState} from "react";
import {Box, Text, useApp, useInput, Static} from "ink";
import TextInput from "ink-text-input";
import Spinner from "ink-spinner";

import {Banner} from "./components/Banner.js";
import {CommandSuggestions} from "./components/CommandSuggestions.js";
import {StatusMessage} from "./components/StatusMessage.js";
import {getCommandSuggestions} from "./utils/commands.js";

import {startSession, type StartedSession} from "./bootstrap.js";
import type {ParsedArgs} from "./parseArgs.js";
import {executeSlashCommand, overviewMessage, summariseCatalog} from "./commands/executor.js";
import type {TurnState} from "./agent/types.js";
import type {TokenUsage} from "./agent/modelClient.js";
import {getErrorMessage} from "./runtime/errors.js";

type ChatRole = "system" | "user" | "assistant" | "tool";

interface ChatMessage {
  id: number;
  role: ChatRole;
  text: string;
}

type SessionState = {status: "loading"} | {status: "ready"; started: StartedSession} | {status: "error"; message: string};

interface AppProps {
  options: ParsedArgs;
}

const STATE_LABELS: Record<TurnState, string> = {
  Received: "Received",
  Classifying: "Classifying request...",
  Validating: "Validating action...",
  Dispatching: "Calling the server...",
  Succeeded: "Done",
  Failed: "Failed",
  ClassificationFailed: "No match"
};

export default function App({options}: AppProps) {
  const {exit} = useApp();
  const [messages, setMessages] = useState<ChatMessage[]>([]);
  const messageCounter = useRef(1);
  const [inputValue, setInputValue] = useState("");
  const [sessionState, setSessionState] = useState<SessionState>({status: "loading"});
  const [attempt, setAttempt] = useState(0);
  const [busy, setBusy] = useState(false);
  const [turnState, setTurnState] = useState<TurnState | undefined>();
  const [usage, setUsage] = useState<TokenUsage>({input_tokens: 0, output_tokens: 0, total_tokens: 0});
  const [commandSuggestions, setCommandSuggestions] = useState<ReturnType<typeof getCommandSuggestions>>([]);
  const [selectedSuggestionIndex, setSelectedSuggestionIndex] = useState(0);
  const abortRef = useRef<AbortController | undefined>(undefined);

  const addMessage = useCallback((role: ChatRole, text: string) => {
    const id = messageCounter.current++;
    setMessages((prev) => [...prev, {id, role, text}]);
  }, []);

  useEffect(() => {
    let cancelled = false;
    setSessionState({status: "loading"});

    startSession(options, {
      onStateChange: (state) => setTurnState(state),
      onUsage: (turnUsage) =>
        setUsage((prev) => ({
          input_tokens: prev.input_tokens + turnUsage.input_tokens,
          output_tokens: prev.output_tokens + turnUsage.output_tokens,
          total_tokens: prev.total_tokens + turnUsage.total_tokens
        }))
    }).then(
      (started) => {
        if (cancelled) return;
        const {session, auth} = started;
        auth.warnings.forEach((warning) => addMessage("system", warning));
        session.catalog.warnings.forEach((warning) => addMessage("system", `Warning: ${warning.message}`));
        addMessage("assistant", `Connected to ${session.config.serverUrl}. ${summariseCatalog(session.catalog)}.`);
        if (attempt === 0) {
          addMessage("assistant", overviewMessage());
        }
        setSessionState({status: "ready", started});
      },
      (error: unknown) => {
        if (cancelled) return;
        setSessionState({status: "error", message: getErrorMessage(error)});
      }
    );

    return () => {
      cancelled = true;
    };
  }, [options, attempt, addMessage]);

  useEffect(() => {
    setCommandSuggestions(getCommandSuggestions(inputValue));
    setSelectedSuggestionIndex(0);
  }, [inputValue]);

  useInput((input, key) => {
    if (key.ctrl && input === "c") {
      exit();
      return;
    }

    if (key.escape && abortRef.current) {
      abortRef.current.abort();
      return;
    }

    if (commandSuggestions.length > 0) {
      if (key.upArrow) {
        setSelectedSuggestionIndex((prev) => (prev > 0 ? prev - 1 : commandSuggestions.length - 1));
      } else if (key.downArrow) {
        setSelectedSuggestionIndex((prev) => (prev < commandSuggestions.length - 1 ? prev + 1 : 0));
      } else if (key.tab || key.return) {
        const selected = commandSuggestions[selectedSuggestionIndex];
        if (selected) {
          setInputValue(selected.command + " ");
        }
      }
    }
  });

  const handleSubmit = useCallback(
    async (value: string) => {
      // Enter picks the highlighted suggestion instead of submitting
      if (commandSuggestions.length > 0) {
        return;
      }

      const trimmed = value.trim();
      if (!trimmed) {
        return;
      }

      setInputValue("");
      addMessage("user", trimmed);

      if (trimmed === "/retry") {
        setAttempt((prev) => prev + 1);
        addMessage("assistant", "Reconnecting...");
        return;
      }

      if (sessionState.status !== "ready") {
        addMessage("assistant", "The session is not ready yet. Try /retry once the server is reachable.");
        return;
      }
      const {session} = sessionState.started;

      const controller = new AbortController();
      abortRef.current = controller;
      setBusy(true);
      try {
        if (trimmed.startsWith("/")) {
          const result = await executeSlashCommand(trimmed, session, controller.signal);
          addMessage(result.isError ? "assistant" : "tool", result.lines.join("\n"));
          if (result.shouldExit) {
            exit();
          }
          return;
        }

        const result = await session.turns.handle(trimmed, {signal: controller.signal});
        addMessage(result.status === "ok" ? "tool" : "assistant", result.payload.text);
      } catch (error) {
        addMessage("assistant", `Error: ${getErrorMessage(error)}`);
      } finally {
        abortRef.current = undefined;
        setTurnState(undefined);
        setBusy(false);
      }
    },
    [sessionState, addMessage, commandSuggestions, exit]
  );

  const renderMessages = () => {
    const items = [{id: 0, type: "banner" as const}, ...messages.map((m) => ({...m, type: "message" as const}))];
    return (
      <Static items={items}>
        {(item) => {
          if (item.type === "banner") {
            return <Banner key="banner" />;
          }
          return (
            <Box key={item.id} flexDirection="column" marginBottom={1}>
              <MessageBubble role={item.role} text={item.text} />
            </Box>
          );
        }}
      </Static>
    );
  };

  const inputPrompt = useMemo(() => {
    if (busy) {
      return (
        <Text color="yellow">
          <Spinner type="dots" /> {turnState ? STATE_LABELS[turnState] : "Working..."}
        </Text>
      );
    }
    if (sessionState.status === "loading") {
      return (
        <Text color="cyan">
          <Spinner type="dots" /> Discovering capabilities...
        </Text>
      );
    }
    if (sessionState.status === "error") {
      return <StatusMessage variant="error" message={sessionState.message} hint="Type /retry to reconnect." />;
    }
    return <Text color="cyan">›</Text>;
  }, [sessionState, busy, turnState]);

  const divider = "═".repeat(Math.min(process.stdout.columns || 80, 80));
  const selected = commandSuggestions[selectedSuggestionIndex];

  return (
    <Box flexDirection="column" gap={1}>
      {renderMessages()}
      {commandSuggestions.length > 0 && (
        <CommandSuggestions suggestions={commandSuggestions} selectedIndex={selectedSuggestionIndex} />
      )}
      <Box flexDirection="column" marginTop={1}>
        <Box>
          <Text color="gray">{divider}</Text>
        </Box>
        <Box>
          {inputPrompt}
          <Box marginLeft={1} flexGrow={1}>
            <TextInput
              value={inputValue}
              onChange={setInputValue}
              onSubmit={handleSubmit}
              placeholder="Ask for something or use /commands"
            />
            {selected && (
              <Text color="gray" dimColor>
                {selected.command.substring(inputValue.length)}
              </Text>
            )}
          </Box>
        </Box>
        <Box>
          <Text color="gray">{divider}</Text>
        </Box>
        {sessionState.status === "ready" && (
          <Box>
            <Text color="gray" dimColor>
              {sessionState.started.session.config.model} · {usage.input_tokens} in / {usage.output_tokens} out tokens ·{" "}
              {sessionState.started.session.memory.size} remembered turns
              {busy ? " · Esc to cancel" : ""}
            </Text>
          </Box>
        )}
      </Box>
    </Box>
  );
}

interface MessageBubbleProps {
  role: ChatRole;
  text: string;
}

function MessageBubble({role, text}: MessageBubbleProps) {
  const color = roleColor(role);

  return (
    <Box flexDirection="column">
      <Box>
        <Text bold color={color}>
          {roleLabel(role)}
        </Text>
      </Box>
      <Box paddingLeft={2}>
        <Text color={role === "system" ? "gray" : undefined}>{text}</Text>
      </Box>
    </Box>
  );
}

function roleLabel(role: ChatRole): string {
  switch (role) {
    case "user":
      return "You";
    case "assistant":
      return "Assistant";
    case "tool":
      return "Result";
    case "system":
      return "System";
  }
}

function roleColor(role: ChatRole): string {
  switch (role) {
    case "user":
      return "green";
    case "assistant":
      return "cyan";
    case "tool":
      return "yellow";
    case "system":
      return "magenta";
  }
}
