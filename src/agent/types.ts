import type {CatalogEntry, ResourceEntry, ToolEntry} from "../runtime/catalog.js";
import type {CapabilityCategory, JsonObject} from "../types/mcp.js";

/** What the classifier proposed. Untrusted until the dispatcher has checked it. */
export type CandidateAction =
  | {kind: "tool_call"; toolName: string; toolInput: JsonObject}
  | {kind: "resource_read"; resourceUri: string}
  | {kind: "list"; category: CapabilityCategory}
  | {kind: "error"; message: string};

/** A candidate after validation: it only references catalog entries. */
export type ResolvedAction =
  | {kind: "tool_call"; tool: ToolEntry; input: JsonObject}
  | {kind: "resource_read"; resource: ResourceEntry}
  | {kind: "list"; category: CapabilityCategory};

export type FailureKind =
  | "ClassificationFailed"
  | "UnknownCapability"
  | "SchemaViolation"
  | "ToolExecutionError"
  | "ServerError"
  | "Transport"
  | "MalformedResponse";

export interface FailureDetail {
  code?: number;
  status?: number;
  message: string;
  data?: unknown;
}

export type Outcome =
  | {kind: "tool_result"; tool: string; payload: JsonObject}
  | {kind: "resource_content"; uri: string; payload: JsonObject}
  | {kind: "list_result"; category: CapabilityCategory; entries: readonly CatalogEntry[]}
  | {kind: "failure"; failure: FailureKind; message: string; detail?: FailureDetail; suggestions?: string[]};

export type FailureOutcome = Extract<Outcome, {kind: "failure"}>;

export type TurnState =
  | "Received"
  | "Classifying"
  | "Validating"
  | "Dispatching"
  | "Succeeded"
  | "Failed"
  | "ClassificationFailed";

export function describeAction(action: CandidateAction): string {
  switch (action.kind) {
    case "tool_call":
      return `tool ${action.toolName} ${JSON.stringify(action.toolInput)}`;
    case "resource_read":
      return `resource ${action.resourceUri}`;
    case "list":
      return `list ${action.category}`;
    case "error":
      return `error ${action.message}`;
  }
}
