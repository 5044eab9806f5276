import type {ConversationTurn} from "../chat/memory.js";
import type {Catalog, PromptEntry, ResourceEntry, ToolEntry} from "../runtime/catalog.js";

export const DEFAULT_INSTRUCTIONS = `You route requests from a user to an MCP server.
Read the query and the previous conversation, then choose exactly one action:
- call one of the listed tools, taking its arguments from the query,
- read one of the listed resources,
- list the tools, resources or prompts the server offers,
- or report that nothing listed can answer the query.
Use only tool names and resource URIs that appear below, spelled exactly as listed.
Only pass arguments that the tool's input schema declares.
Use the previous conversation to fill in references such as "that well" or "the same one".`;

export const RESPONSE_CONTRACT = `Respond with a single JSON object and nothing else, in one of these forms:
{"action": "tool", "tool_name": "<tool name>", "tool_input": {"<argument>": <value>}}
{"action": "resource", "resource_uri": "<resource uri>"}
{"action": "list", "type": "tools" | "resources" | "prompts"}
{"action": "error", "message": "<why nothing matches>"}`;

export interface ClassifierPromptInput {
  instructions: string;
  catalog: Catalog;
  history: readonly ConversationTurn[];
  query: string;
}

/**
 * Builds the classifier prompt. Pure: the same catalog, history and query
 * always render the same text. Names, URIs and descriptions are embedded
 * exactly as the server reported them.
 */
export function renderClassifierPrompt({instructions, catalog, history, query}: ClassifierPromptInput): string {
  return [
    instructions.trim(),
    "",
    "Tools:",
    ...section(catalog.tools, formatTool, "No tools available."),
    "",
    "Resources:",
    ...section(catalog.resources, formatResource, "No resources available."),
    "",
    "Prompts:",
    ...section(catalog.prompts, formatPrompt, "No prompts available."),
    "",
    "Previous conversation:",
    ...section(history, formatTurn, "None."),
    "",
    `Query: ${query}`,
    "",
    RESPONSE_CONTRACT
  ].join("\n");
}

function section<T>(items: readonly T[], format: (item: T) => string, empty: string): string[] {
  return items.length > 0 ? items.map(format) : [empty];
}

function formatTool(tool: ToolEntry): string {
  const schema = tool.inputSchema === undefined ? "" : `, Input schema: ${JSON.stringify(tool.inputSchema)}`;
  return `- Name: ${tool.name}, Description: ${tool.description}${schema}`;
}

function formatResource(resource: ResourceEntry): string {
  const name = resource.name ? `, Name: ${resource.name}` : "";
  return `- URI: ${resource.uri}${name}, Description: ${resource.description}`;
}

function formatPrompt(prompt: PromptEntry): string {
  const args = prompt.arguments.length > 0
    ? `, Arguments: ${prompt.arguments.map((arg) => (arg.required ? `${arg.name} (required)` : arg.name)).join(", ")}`
    : "";
  return `- Name: ${prompt.name}, Description: ${prompt.description}${args}`;
}

function formatTurn(turn: ConversationTurn): string {
  return [`User: ${turn.query}`, `Action: ${turn.action}`, `Result: ${turn.result}`].join("\n");
}

export interface FormatterPromptInput {
  instructions: string;
  query: string;
  output: string;
}

export function renderFormatterPrompt({instructions, query, output}: FormatterPromptInput): string {
  return [instructions.trim(), "", `Query: ${query}`, `Output: ${output}`].join("\n");
}
