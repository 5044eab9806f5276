import {completeWithin, type Classifier} from "./classifier.js";
import {renderFormatterPrompt} from "./prompts.js";
import type {Outcome} from "./types.js";
import {getErrorMessage} from "../runtime/errors.js";
import {createLogger, type Logger} from "../utils/logger.js";

export interface ResultFormatterOptions {
  classifier: Classifier;
  instructions: string;
  timeoutMs?: number;
  logger?: Logger;
}

export interface FormatOptions {
  signal?: AbortSignal;
}

/**
 * Optional second pass that asks the classifier service to rewrite a
 * result for the user. The locally formatted text is returned whenever the
 * rewrite fails, times out or comes back empty. Failures are never
 * rewritten.
 */
export class ResultFormatter {
  private readonly classifier: Classifier;
  private readonly instructions: string;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;

  constructor(options: ResultFormatterOptions) {
    this.classifier = options.classifier;
    this.instructions = options.instructions;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createLogger("Formatter");
  }

  async format(query: string, outcome: Outcome, text: string, options: FormatOptions = {}): Promise<string> {
    if (outcome.kind === "failure") {
      return text;
    }

    const prompt = renderFormatterPrompt({instructions: this.instructions, query, output: text});
    this.logger.debug("Prompt:", prompt);

    let reply: string;
    try {
      reply = await completeWithin(this.classifier, prompt, {signal: options.signal, timeoutMs: this.timeoutMs});
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      this.logger.warn(`Formatting failed, showing the raw result: ${getErrorMessage(error)}`);
      return text;
    }

    const formatted = reply.trim();
    if (!formatted) {
      this.logger.warn("Formatter returned nothing, showing the raw result");
      return text;
    }
    return formatted;
  }
}
