import {ZodError} from "zod";
import {fromZodError} from "zod-validation-error";

export type ProtocolErrorKind = "Transport" | "ServerError" | "MalformedResponse";

export interface ProtocolErrorDetails {
  method?: string;
  code?: number;
  status?: number;
  data?: unknown;
}

/**
 * Raised by the MCP client for anything that stops a JSON-RPC call from
 * producing a result. The server-supplied code and data are kept as-is.
 */
export class ProtocolError extends Error {
  readonly kind: ProtocolErrorKind;
  readonly method?: string;
  readonly code?: number;
  readonly status?: number;
  readonly data?: unknown;

  constructor(kind: ProtocolErrorKind, message: string, details: ProtocolErrorDetails = {}) {
    super(message);
    this.name = "ProtocolError";
    this.kind = kind;
    this.method = details.method;
    this.code = details.code;
    this.status = details.status;
    this.data = details.data;
  }

  /** One-line description, e.g. `server error -32602: Invalid params`. */
  describe(): string {
    switch (this.kind) {
      case "ServerError":
        return this.code !== undefined ? `server error ${this.code}: ${this.message}` : `server error: ${this.message}`;
      case "Transport":
        return this.status !== undefined ? `transport error (HTTP ${this.status}): ${this.message}` : `transport error: ${this.message}`;
      case "MalformedResponse":
      default:
        return `malformed response: ${this.message}`;
    }
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ClassifierError extends Error {
  readonly provider: string;

  constructor(provider: string, message: string) {
    super(`${provider} error: ${message}`);
    this.name = "ClassifierError";
    this.provider = provider;
  }
}

export function isProtocolError(error: unknown, kind?: ProtocolErrorKind): error is ProtocolError {
  return error instanceof ProtocolError && (kind === undefined || error.kind === kind);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

/**
 * Cancellation is reported by the platform as an `AbortError` (fetch, the
 * Anthropic SDK) or as axios' `CanceledError`.
 */
export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) {
    return true;
  }
  return error instanceof Error && (error.name === "AbortError" || error.name === "CanceledError");
}
