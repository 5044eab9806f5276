import axios, {type AxiosInstance} from "axios";
import {z} from "zod";

import {ProtocolError} from "./errors.js";
import {createLogger, type Logger} from "../utils/logger.js";
import {isJsonObject, type JsonObject, type JsonRpcRequest, type McpMethod, type ToolArguments} from "../types/mcp.js";

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * The slice of the MCP surface the catalog and the dispatcher depend on.
 * `McpClient` is the network implementation; tests provide their own.
 */
export interface CapabilityServer {
  listTools(cursor?: string, options?: CallOptions): Promise<JsonObject>;
  listResources(cursor?: string, options?: CallOptions): Promise<JsonObject>;
  listPrompts(cursor?: string, options?: CallOptions): Promise<JsonObject>;
  callTool(name: string, args: ToolArguments, options?: CallOptions): Promise<JsonObject>;
  readResource(uri: string, options?: CallOptions): Promise<JsonObject>;
  ping(options?: CallOptions): Promise<JsonObject>;
}

export type ToolArgumentsKey = "arguments" | "params";

export interface McpClientOptions {
  endpoint: string;
  token?: string;
  timeoutMs?: number;
  toolArgumentsKey?: ToolArgumentsKey;
  logger?: Logger;
}

const errorObjectSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional()
});

/**
 * JSON-RPC 2.0 client for an MCP server reachable over HTTP POST.
 *
 * Every call gets a fresh id from a per-client counter and the response id
 * must echo it. Failures surface as `ProtocolError`; nothing is retried here.
 */
export class McpClient implements CapabilityServer {
  readonly endpoint: string;
  private readonly http: AxiosInstance;
  private readonly toolArgumentsKey: ToolArgumentsKey;
  private readonly logger: Logger;
  private nextId = 1;

  constructor(options: McpClientOptions) {
    this.endpoint = options.endpoint;
    this.toolArgumentsKey = options.toolArgumentsKey ?? "arguments";
    this.logger = options.logger ?? createLogger("Protocol");
    this.http = axios.create({
      timeout: options.timeoutMs ?? 30_000,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json, text/event-stream",
        ...(options.token ? {Authorization: `Bearer ${options.token}`} : {})
      }
    });
  }

  async call(method: McpMethod, params: JsonObject = {}, options: CallOptions = {}): Promise<JsonObject> {
    const request: JsonRpcRequest = {jsonrpc: "2.0", method, params, id: this.nextId++};
    this.logger.debug(`-> ${method} #${request.id}`, params);

    let status: number;
    let body: unknown;
    try {
      const response = await this.http.post<unknown>(this.endpoint, request, {
        signal: options.signal,
        responseType: "text",
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true
      });
      status = response.status;
      body = response.data;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProtocolError("Transport", message, {method});
    }

    if (status < 200 || status >= 300) {
      const text = typeof body === "string" ? body.trim().slice(0, 200) : "";
      throw new ProtocolError("Transport", text || `request failed with status ${status}`, {method, status});
    }

    const envelope = parseEnvelope(body, method);
    if (envelope.id !== request.id) {
      throw new ProtocolError("MalformedResponse", `response id ${String(envelope.id)} does not match request id ${request.id}`, {method});
    }

    if ("error" in envelope && envelope.error !== undefined) {
      const parsed = errorObjectSchema.safeParse(envelope.error);
      if (!parsed.success) {
        throw new ProtocolError("MalformedResponse", "error member is not a JSON-RPC error object", {method, data: envelope.error});
      }
      this.logger.debug(`<- ${method} #${request.id} error ${parsed.data.code}`);
      throw new ProtocolError("ServerError", parsed.data.message, {method, code: parsed.data.code, data: parsed.data.data});
    }

    if (!("result" in envelope)) {
      throw new ProtocolError("MalformedResponse", "response carries neither result nor error", {method});
    }

    this.logger.debug(`<- ${method} #${request.id}`, envelope.result);
    return isJsonObject(envelope.result) ? envelope.result : {value: envelope.result};
  }

  listTools(cursor?: string, options?: CallOptions): Promise<JsonObject> {
    return this.call("tools/list", cursor ? {cursor} : {}, options);
  }

  listResources(cursor?: string, options?: CallOptions): Promise<JsonObject> {
    return this.call("resources/list", cursor ? {cursor} : {}, options);
  }

  listPrompts(cursor?: string, options?: CallOptions): Promise<JsonObject> {
    return this.call("prompts/list", cursor ? {cursor} : {}, options);
  }

  callTool(name: string, args: ToolArguments, options?: CallOptions): Promise<JsonObject> {
    return this.call("tools/call", {name, [this.toolArgumentsKey]: args}, options);
  }

  readResource(uri: string, options?: CallOptions): Promise<JsonObject> {
    return this.call("resources/read", {uri}, options);
  }

  ping(options?: CallOptions): Promise<JsonObject> {
    return this.call("ping", {}, options);
  }
}

/**
 * Streamable-HTTP servers may answer with an SSE stream instead of a JSON
 * body; the JSON-RPC response is then the payload of a `data:` event.
 */
function parseEnvelope(body: unknown, method: string): JsonObject {
  if (isJsonObject(body)) {
    return body;
  }
  if (typeof body !== "string" || body.trim().length === 0) {
    throw new ProtocolError("MalformedResponse", "empty response body", {method});
  }

  const text = body.trim();
  const candidates = text.startsWith("{") ? [text] : sseDataPayloads(text);
  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    if (isJsonObject(parsed) && ("result" in parsed || "error" in parsed)) {
      return parsed;
    }
  }
  throw new ProtocolError("MalformedResponse", `response is not a JSON-RPC envelope: ${text.slice(0, 120)}`, {method});
}

export function sseDataPayloads(stream: string): string[] {
  const payloads: string[] = [];
  for (const event of stream.split(/\r?\n\r?\n/)) {
    const data = event
      .split(/\r?\n/)
      .filter((line) => line.startsWith("data:"))
      .map((line) => line.slice(5).trimStart());
    if (data.length > 0) {
      payloads.push(data.join("\n"));
    }
  }
  return payloads;
}
