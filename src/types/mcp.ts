/**
 * MCP Protocol Type Definitions
 *
 * JSON-RPC 2.0 envelopes exchanged with the capability server, and the
 * shapes of the discovery results we read from it.
 */

export type JsonRpcId = number | string;

export type JsonObject = Record<string, unknown>;

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params: JsonObject;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse<T = unknown> {
  jsonrpc: "2.0";
  result?: T;
  error?: JsonRpcErrorObject;
  id?: JsonRpcId | null;
}

export type ToolArguments = JsonObject;

export type McpMethod = "tools/list" | "resources/list" | "prompts/list" | "tools/call" | "resources/read" | "ping";

export type CapabilityCategory = "tools" | "resources" | "prompts";

export const CAPABILITY_CATEGORIES: readonly CapabilityCategory[] = ["tools", "resources", "prompts"];

export function isCapabilityCategory(value: string): value is CapabilityCategory {
  return value === "tools" || value === "resources" || value === "prompts";
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
