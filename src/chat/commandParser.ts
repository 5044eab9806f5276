import {isCapabilityCategory, type CapabilityCategory} from "../types/mcp.js";

export type CommandKind = "help" | "exit" | "list" | "refresh" | "ping" | "history" | "call" | "read" | "unknown";

export interface HelpCommand {
  kind: "help";
}

export interface ExitCommand {
  kind: "exit";
}

export interface ListCommand {
  kind: "list";
  category: CapabilityCategory;
}

export interface SimpleCommand {
  kind: "refresh" | "ping" | "history";
}

export interface CallCommand {
  kind: "call";
  tool?: string;
  argsJson?: string;
}

export interface ReadCommand {
  kind: "read";
  uri?: string;
}

export interface UnknownCommand {
  kind: "unknown";
  message: string;
}

export type ParsedCommand =
  | HelpCommand
  | ExitCommand
  | ListCommand
  | SimpleCommand
  | CallCommand
  | ReadCommand
  | UnknownCommand;

const LIST_ALIASES = new Map<string, CapabilityCategory>([
  ["tools", "tools"],
  ["resources", "resources"],
  ["prompts", "prompts"]
]);

const SIMPLE_COMMANDS = new Map<string, SimpleCommand["kind"]>([
  ["refresh", "refresh"],
  ["ping", "ping"],
  ["history", "history"]
]);

export function parseCommand(input: string): ParsedCommand {
  const trimmed = input.trim();
  const withoutSlash = trimmed.startsWith("/") ? trimmed.slice(1).trim() : trimmed;

  const tokens = tokenize(withoutSlash);
  const first = tokens.shift();
  if (first === undefined) {
    return {kind: "help"};
  }
  const keyword = first.toLowerCase();

  if (keyword === "help" || keyword === "?") {
    return {kind: "help"};
  }

  if (keyword === "exit" || keyword === "quit" || keyword === "q") {
    return {kind: "exit"};
  }

  const aliased = LIST_ALIASES.get(keyword);
  if (aliased) {
    return {kind: "list", category: aliased};
  }

  if (keyword === "list") {
    const category = (tokens[0] ?? "tools").toLowerCase();
    if (!isCapabilityCategory(category)) {
      return {kind: "unknown", message: `Cannot list "${category}". Choose tools, resources or prompts.`};
    }
    return {kind: "list", category};
  }

  if (keyword === "call") {
    return parseCall(tokens);
  }

  if (keyword === "read") {
    const [key, value] = tokens.length > 0 ? splitToken(tokens[0]) : [undefined, undefined];
    return {kind: "read", uri: key === undefined || key === "uri" ? value : tokens[0]};
  }

  const simpleKind = SIMPLE_COMMANDS.get(keyword);
  if (simpleKind) {
    return {kind: simpleKind};
  }

  return {
    kind: "unknown",
    message: `I don't recognise the command "${keyword}". Try "/help" to see what I can do.`
  };
}

function parseCall(tokens: string[]): CallCommand {
  let tool: string | undefined;
  let argsJson: string | undefined;

  if (tokens.length > 0 && !tokens[0].includes("=")) {
    tool = tokens.shift();
  }

  for (const token of tokens) {
    const [key, value] = splitToken(token);
    if (value === undefined) {
      continue;
    }
    if (key === undefined) {
      argsJson ??= value;
      continue;
    }
    if (key === "tool" && !tool) {
      tool = value;
    }
    if (key === "args" || key === "json") {
      argsJson = value;
    }
  }

  return {kind: "call", tool, argsJson};
}

export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  const regex = /"([^"\\]*(\\.[^"\\]*)*)"|'([^'\\]*(\\.[^'\\]*)*)'|[^\s]+/g;
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    tokens.push(unquote(match[0]));
  }
  return tokens;
}

function unquote(token: string): string {
  if (token.length >= 2) {
    const first = token[0];
    const last = token[token.length - 1];
    if ((first === '"' && last === '"') || (first === "'" && last === "'")) {
      const inner = token.slice(1, -1);
      return inner.replace(/\\(["'\\])/g, "$1").replace(/\\n/g, "\n").replace(/\\t/g, "\t");
    }
  }
  return token;
}

/** `key=value` splits at the first `=`; a bare token yields `[undefined, token]`. */
export function splitToken(token: string): [string | undefined, string | undefined] {
  const index = token.indexOf("=");
  if (index === -1) {
    return [undefined, token];
  }
  return [token.slice(0, index).toLowerCase(), token.slice(index + 1)];
}
