import type {CandidateAction, FailureKind, FailureOutcome, Outcome, ResolvedAction} from "./types.js";
import type {Catalog} from "../runtime/catalog.js";
import type {CallOptions, CapabilityServer} from "../runtime/mcp.js";
import {getErrorMessage, isProtocolError, ProtocolError} from "../runtime/errors.js";
import {validateToolInput} from "../runtime/schema.js";
import {contentText} from "../utils/format.js";
import {createLogger, type Logger} from "../utils/logger.js";
import {nearestCapabilities, nearestNames} from "../utils/similarity.js";
import type {JsonObject} from "../types/mcp.js";

export interface DispatcherOptions {
  server: CapabilityServer;
  /** Extra attempts after a Transport failure. Capped at 1. */
  transportRetries?: number;
  logger?: Logger;
}

export interface DispatchOptions extends CallOptions {
  /** The user's query, used to suggest capabilities when classification fails. */
  query?: string;
}

/**
 * Re-checks the classifier's candidate against the catalog and only then
 * talks to the server. Unknown names and bad arguments never leave the
 * process.
 */
export class Dispatcher {
  private readonly server: CapabilityServer;
  private readonly transportRetries: number;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions) {
    this.server = options.server;
    this.transportRetries = Math.min(Math.max(options.transportRetries ?? 0, 0), 1);
    this.logger = options.logger ?? createLogger("Dispatch");
  }

  async resolveAndExecute(candidate: CandidateAction, catalog: Catalog, options: DispatchOptions = {}): Promise<Outcome> {
    const resolved = this.resolve(candidate, catalog, options.query);
    if (resolved.kind === "failure") {
      this.logger.debug(`Rejected candidate (${resolved.failure}): ${resolved.message}`);
      return resolved;
    }
    return this.execute(resolved, catalog, options);
  }

  resolve(candidate: CandidateAction, catalog: Catalog, query?: string): ResolvedAction | FailureOutcome {
    switch (candidate.kind) {
      case "list":
        return {kind: "list", category: candidate.category};

      case "tool_call": {
        const tool = catalog.lookupTool(candidate.toolName);
        if (!tool) {
          return failure("UnknownCapability", `Unknown tool "${candidate.toolName}".`, {
            suggestions: nearestNames(candidate.toolName, catalog.names("tools"))
          });
        }
        const problems = validateToolInput(candidate.toolInput, tool.schema);
        if (problems.length > 0) {
          return failure(
            "SchemaViolation",
            `Invalid input for tool "${tool.name}": ${problems.map((problem) => problem.message).join("; ")}.`
          );
        }
        return {kind: "tool_call", tool, input: candidate.toolInput};
      }

      case "resource_read": {
        const resource = catalog.lookupResource(candidate.resourceUri);
        if (!resource) {
          return failure("UnknownCapability", `Unknown resource "${candidate.resourceUri}".`, {
            suggestions: nearestNames(candidate.resourceUri, catalog.names("resources"))
          });
        }
        return {kind: "resource_read", resource};
      }

      case "error":
        return failure(
          "ClassificationFailed",
          `Could not map the query to an available capability: ${candidate.message}.`,
          {suggestions: query ? nearestCapabilities(query, catalog) : []}
        );
    }
  }

  async execute(action: ResolvedAction, catalog: Catalog, options: CallOptions = {}): Promise<Outcome> {
    switch (action.kind) {
      case "list":
        return {kind: "list_result", category: action.category, entries: catalog.list(action.category)};

      case "tool_call": {
        const name = action.tool.name;
        try {
          const payload = await this.withRetry(`tools/call ${name}`, options.signal, () =>
            this.server.callTool(name, action.input, {signal: options.signal})
          );
          if (payload.isError === true) {
            return failure("ToolExecutionError", `Tool "${name}" reported an error.`, {
              detail: {message: contentText(payload) ?? "no details provided"}
            });
          }
          return {kind: "tool_result", tool: name, payload};
        } catch (error) {
          return this.protocolFailure(error, `tool "${name}"`, "ToolExecutionError", options.signal);
        }
      }

      case "resource_read": {
        const uri = action.resource.uri;
        try {
          const payload = await this.withRetry(`resources/read ${uri}`, options.signal, () =>
            this.server.readResource(uri, {signal: options.signal})
          );
          return {kind: "resource_content", uri, payload};
        } catch (error) {
          return this.protocolFailure(error, `resource "${uri}"`, "ServerError", options.signal);
        }
      }
    }
  }

  private async withRetry(label: string, signal: AbortSignal | undefined, call: () => Promise<JsonObject>): Promise<JsonObject> {
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await call();
      } catch (error) {
        const retryable = isProtocolError(error, "Transport") && attempt < this.transportRetries && !signal?.aborted;
        if (!retryable) {
          throw error;
        }
        this.logger.warn(`${label} failed (${getErrorMessage(error)}); retrying once`);
      }
    }
  }

  private protocolFailure(error: unknown, target: string, serverErrorKind: FailureKind, signal?: AbortSignal): FailureOutcome {
    if (signal?.aborted || !(error instanceof ProtocolError)) {
      throw error;
    }
    const detail = {
      message: error.message,
      ...(error.code !== undefined ? {code: error.code} : {}),
      ...(error.status !== undefined ? {status: error.status} : {}),
      ...(error.data !== undefined ? {data: error.data} : {})
    };
    this.logger.warn(`${target}: ${error.describe()}`);

    switch (error.kind) {
      case "ServerError":
        return failure(serverErrorKind, `The server rejected the request for ${target}.`, {detail});
      case "Transport":
        return failure("Transport", `Could not reach the capability server for ${target}.`, {detail});
      case "MalformedResponse":
        return failure("MalformedResponse", `The server sent an invalid response for ${target}.`, {detail});
    }
  }
}

function failure(
  kind: FailureKind,
  message: string,
  extra: Pick<FailureOutcome, "detail" | "suggestions"> = {}
): FailureOutcome {
  const outcome: FailureOutcome = {kind: "failure", failure: kind, message};
  if (extra.detail) {
    outcome.detail = extra.detail;
  }
  if (extra.suggestions && extra.suggestions.length > 0) {
    outcome.suggestions = extra.suggestions;
  }
  return outcome;
}
