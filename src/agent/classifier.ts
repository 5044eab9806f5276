import {z} from "zod";

import {DEFAULT_INSTRUCTIONS, renderClassifierPrompt} from "./prompts.js";
import type {CandidateAction} from "./types.js";
import type {ConversationTurn} from "../chat/memory.js";
import type {Catalog} from "../runtime/catalog.js";
import {ClassifierError, getErrorMessage} from "../runtime/errors.js";
import {createLogger, type Logger} from "../utils/logger.js";
import {isJsonObject} from "../types/mcp.js";

/**
 * The external classifier: prompt text in, raw text out. The text is
 * expected, not guaranteed, to contain one JSON object.
 */
export interface Classifier {
  complete(prompt: string, options?: {signal?: AbortSignal}): Promise<string>;
}

export const UNPARSEABLE_OUTPUT = "unparseable classifier output";

export interface ClassifierGatewayOptions {
  classifier: Classifier;
  instructions?: string;
  historyWindow?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export interface ClassifyOptions {
  signal?: AbortSignal;
}

/**
 * Free text in, best-effort structured guess out. Classifier failures of
 * any sort come back as an `error` candidate; only a cancelled turn throws.
 * No check against the catalog happens here.
 */
export class ClassifierGateway {
  private readonly classifier: Classifier;
  private readonly instructions: string;
  private readonly historyWindow: number;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;

  constructor(options: ClassifierGatewayOptions) {
    this.classifier = options.classifier;
    this.instructions = options.instructions ?? DEFAULT_INSTRUCTIONS;
    this.historyWindow = options.historyWindow ?? 5;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createLogger("Classifier");
  }

  render(query: string, history: readonly ConversationTurn[], catalog: Catalog): string {
    return renderClassifierPrompt({
      instructions: this.instructions,
      catalog,
      history: this.historyWindow > 0 ? history.slice(-this.historyWindow) : [],
      query
    });
  }

  async classify(
    query: string,
    history: readonly ConversationTurn[],
    catalog: Catalog,
    options: ClassifyOptions = {}
  ): Promise<CandidateAction> {
    const prompt = this.render(query, history, catalog);
    this.logger.debug("Prompt:", prompt);

    let raw: string;
    try {
      raw = await completeWithin(this.classifier, prompt, {signal: options.signal, timeoutMs: this.timeoutMs});
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      this.logger.warn(`Classifier call failed: ${getErrorMessage(error)}`);
      return {kind: "error", message: `classifier unavailable: ${getErrorMessage(error)}`};
    }

    this.logger.debug("Raw output:", raw);
    const candidate = parseCandidateAction(raw);
    if (candidate.kind === "error" && candidate.message === UNPARSEABLE_OUTPUT) {
      this.logger.warn("Classifier output could not be parsed");
    }
    return candidate;
  }
}

export interface CompleteWithinOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * One classifier-service call that settles as soon as the caller aborts or
 * the timeout fires, whether or not the backend honours its own signal.
 */
export async function completeWithin(
  classifier: Classifier,
  prompt: string,
  {signal, timeoutMs}: CompleteWithinOptions = {}
): Promise<string> {
  const controller = new AbortController();
  const guards: Array<Promise<never>> = [];
  const cleanups: Array<() => void> = [];

  if (signal) {
    guards.push(
      new Promise<never>((_resolve, reject) => {
        const onAbort = () => {
          const reason = abortReason(signal);
          controller.abort(reason);
          reject(reason);
        };
        if (signal.aborted) {
          onAbort();
          return;
        }
        signal.addEventListener("abort", onAbort, {once: true});
        cleanups.push(() => signal.removeEventListener("abort", onAbort));
      })
    );
  }

  if (timeoutMs) {
    guards.push(
      new Promise<never>((_resolve, reject) => {
        const timer = setTimeout(() => {
          const error = new ClassifierError("classifier", `timed out after ${timeoutMs}ms`);
          controller.abort(error);
          reject(error);
        }, timeoutMs);
        cleanups.push(() => clearTimeout(timer));
      })
    );
  }

  try {
    return await Promise.race([classifier.complete(prompt, {signal: controller.signal}), ...guards]);
  } finally {
    cleanups.forEach((cleanup) => cleanup());
  }
}

function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error("classifier call cancelled");
  error.name = "AbortError";
  return error;
}

const categorySchema = z.enum(["tools", "resources", "prompts"]);

const toolActionSchema = z.object({
  tool_name: z.string().trim().min(1),
  tool_input: z.record(z.unknown()).nullish()
});

const resourceActionSchema = z.object({
  resource_uri: z.string().trim().min(1)
});

const listActionSchema = z
  .object({
    type: categorySchema.optional(),
    category: categorySchema.optional()
  })
  .refine((value) => value.type !== undefined || value.category !== undefined);

const errorActionSchema = z.object({
  message: z.string().nullish()
});

/** Maps the classifier's JSON reply onto a candidate action. */
export function parseCandidateAction(raw: string): CandidateAction {
  const value = extractFirstJsonObject(raw);
  const action = value?.action;
  if (value === undefined || typeof action !== "string") {
    return {kind: "error", message: UNPARSEABLE_OUTPUT};
  }

  switch (action.trim().toLowerCase()) {
    case "tool":
    case "tool_call": {
      const parsed = toolActionSchema.safeParse(value);
      return parsed.success
        ? {kind: "tool_call", toolName: parsed.data.tool_name, toolInput: parsed.data.tool_input ?? {}}
        : {kind: "error", message: UNPARSEABLE_OUTPUT};
    }
    case "resource":
    case "resource_read": {
      const parsed = resourceActionSchema.safeParse(value);
      return parsed.success
        ? {kind: "resource_read", resourceUri: parsed.data.resource_uri}
        : {kind: "error", message: UNPARSEABLE_OUTPUT};
    }
    case "list": {
      const parsed = listActionSchema.safeParse(value);
      if (!parsed.success) {
        return {kind: "error", message: UNPARSEABLE_OUTPUT};
      }
      const category = parsed.data.type ?? parsed.data.category;
      return category ? {kind: "list", category} : {kind: "error", message: UNPARSEABLE_OUTPUT};
    }
    case "error": {
      const parsed = errorActionSchema.safeParse(value);
      const message = parsed.success && parsed.data.message ? parsed.data.message : "no matching capability";
      return {kind: "error", message};
    }
    default:
      return {kind: "error", message: UNPARSEABLE_OUTPUT};
  }
}

/**
 * Returns the first balanced `{...}` span in `text` that parses as a JSON
 * object. Surrounding prose and Markdown fences are ignored.
 */
export function extractFirstJsonObject(text: string): Record<string, unknown> | undefined {
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    const end = findClosingBrace(text, start);
    if (end === -1) {
      continue;
    }
    const parsed = tryParseJson(text.slice(start, end + 1));
    if (isJsonObject(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }
    if (char === "\"") {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}
