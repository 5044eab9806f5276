import React from "react";
import {Box, Text} from "ink";

const MCP = [" __  __  ____ ____  ", "|  \\/  |/ ___|  _ \\ ", "| |\\/| | |   | |_) |", "| |  | | |___|  __/ ", "|_|  |_|\\____|_|    "];

const AGENT = [
  "    _                    _   ",
  "   / \\   __ _  ___ _ __ | |_ ",
  "  / _ \\ / _` |/ _ \\ '_ \\| __|",
  " / ___ \\ (_| |  __/ | | | |_ ",
  "/_/   \\_\\__, |\\___|_| |_|\\__|",
  "        |___/                "
];

export function Banner() {
  const rows = Math.max(MCP.length, AGENT.length);
  return (
    <Box flexDirection="column" marginBottom={1}>
      {Array.from({length: rows}, (_, index) => (
        <Box key={index}>
          <Text bold>
            <Text color="cyan">{(MCP[index] ?? "").padEnd(MCP[0].length)}</Text>
            <Text color="magenta">{` ${AGENT[index] ?? ""}`}</Text>
          </Text>
        </Box>
      ))}
    </Box>
  );
}
