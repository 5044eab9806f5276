import {parseCommand, type CallCommand, type ReadCommand} from "../chat/commandParser.js";
import type {AgentSession} from "../agent/session.js";
import type {CandidateAction} from "../agent/types.js";
import type {Catalog} from "../runtime/catalog.js";
import {getErrorMessage, isProtocolError} from "../runtime/errors.js";
import {isJsonObject} from "../types/mcp.js";
import {formatEntries, formatOutcome} from "../utils/format.js";

export interface CommandExecutionResult {
  lines: string[];
  isError?: boolean;
  shouldExit?: boolean;
}

export async function executeSlashCommand(
  input: string,
  session: AgentSession,
  signal?: AbortSignal
): Promise<CommandExecutionResult> {
  const parsed = parseCommand(input);

  switch (parsed.kind) {
    case "help":
      return {lines: [detailedHelpMessage()]};

    case "exit":
      return {lines: ["Goodbye!"], shouldExit: true};

    case "list":
      return {lines: [formatEntries(parsed.category, session.catalog.list(parsed.category))]};

    case "refresh": {
      const before = session.catalog;
      const after = await session.turns.refreshCatalog(signal);
      const lines = [`${summariseCatalog(after)}${after.equals(before) ? " (unchanged)" : ""}`];
      lines.push(...after.warnings.map((warning) => `Warning: ${warning.message}`));
      return {lines};
    }

    case "ping":
      try {
        await session.server.ping({signal});
        return {lines: [`Server at ${session.config.serverUrl} is reachable.`]};
      } catch (error) {
        if (isProtocolError(error)) {
          return {lines: [`Ping failed: ${error.describe()}`], isError: true};
        }
        throw error;
      }

    case "history":
      return {lines: [formatHistory(session)]};

    case "call":
      return executeCall(parsed, session, signal);

    case "read":
      return executeRead(parsed, session, signal);

    case "unknown":
      return {lines: [parsed.message], isError: true};
  }
}

async function executeCall(parsed: CallCommand, session: AgentSession, signal?: AbortSignal): Promise<CommandExecutionResult> {
  if (!parsed.tool) {
    return {lines: ["Tool name is required for /call."], isError: true};
  }

  let input: unknown = {};
  if (parsed.argsJson) {
    try {
      input = JSON.parse(parsed.argsJson);
    } catch (error) {
      return {lines: [`Invalid JSON for args: ${getErrorMessage(error)}`], isError: true};
    }
  }
  if (!isJsonObject(input)) {
    return {lines: ["Tool arguments must be a JSON object."], isError: true};
  }

  return dispatchDirect({kind: "tool_call", toolName: parsed.tool, toolInput: input}, session, signal);
}

async function executeRead(parsed: ReadCommand, session: AgentSession, signal?: AbortSignal): Promise<CommandExecutionResult> {
  if (!parsed.uri) {
    return {lines: ["Resource URI is required for /read."], isError: true};
  }
  return dispatchDirect({kind: "resource_read", resourceUri: parsed.uri}, session, signal);
}

/** Direct commands skip the classifier but get the same catalog checks. */
async function dispatchDirect(
  candidate: CandidateAction,
  session: AgentSession,
  signal?: AbortSignal
): Promise<CommandExecutionResult> {
  const outcome = await session.dispatcher.resolveAndExecute(candidate, session.catalog, {signal});
  return {lines: [formatOutcome(outcome)], isError: outcome.kind === "failure"};
}

export function summariseCatalog(catalog: Catalog): string {
  return `Catalog: ${catalog.tools.length} tools, ${catalog.resources.length} resources, ${catalog.prompts.length} prompts`;
}

function formatHistory(session: AgentSession): string {
  const turns = session.memory.all();
  if (turns.length === 0) {
    return "No conversation history yet.";
  }
  return turns
    .map((turn) => [`#${turn.index + 1} ${turn.query}`, `  Action: ${turn.action}`, `  Result: ${turn.result}`].join("\n"))
    .join("\n");
}

export function overviewMessage(): string {
  return [
    "Ask in plain language and I will pick the matching tool or resource on the MCP server.",
    "",
    "Essential commands:",
    "  /help     Show help message",
    "  /tools    List available tools",
    "  /history  Show recent turns",
    "  /exit     Exit the CLI",
    ""
  ].join("\n");
}

export function detailedHelpMessage(): string {
  const basicCommands = [
    {cmd: "/help", desc: "Show this help message"},
    {cmd: "/history", desc: "Show the turns the agent remembers"},
    {cmd: "/exit", desc: "Exit the CLI (aliases: /quit, /q)"}
  ];

  const catalogCommands = [
    {cmd: "/tools", desc: "List tools from the catalog"},
    {cmd: "/resources", desc: "List resources from the catalog"},
    {cmd: "/prompts", desc: "List prompts from the catalog"},
    {cmd: "/refresh", desc: "Rediscover the server's capabilities"},
    {cmd: "/ping", desc: "Check server connectivity"}
  ];

  const directCommands = [
    {cmd: "/call", args: "<tool> '<json>'", desc: "Invoke a tool without the classifier"},
    {cmd: "/read", args: "<uri>", desc: "Read a resource without the classifier"}
  ];

  const formatCommands = (cmds: Array<{cmd: string; args?: string; desc: string}>) => {
    const maxLength = Math.max(...cmds.map((c) => (c.cmd + (c.args ? " " + c.args : "")).length));
    return cmds.map(({cmd, args, desc}) => {
      const full = cmd + (args ? " " + args : "");
      const padding = " ".repeat(maxLength - full.length + 2);
      return `  ${full}${padding}${desc}`;
    });
  };

  return [
    "MCP Intent Agent - Natural Language Interface",
    "",
    "Examples:",
    '  "What tools are available?"',
    '  "Add 2 and 3"',
    '  "Show me the wells resource"',
    "",
    "Basic Commands:",
    ...formatCommands(basicCommands),
    "",
    "Catalog:",
    ...formatCommands(catalogCommands),
    "",
    "Direct Invocation:",
    ...formatCommands(directCommands)
  ].join("\n");
}
