import type {ClassifierGateway} from "./classifier.js";
import type {Dispatcher} from "./dispatcher.js";
import type {ResultFormatter} from "./formatter.js";
import {describeAction, type CandidateAction, type Outcome, type TurnState} from "./types.js";
import type {ConversationMemory} from "../chat/memory.js";
import type {Catalog} from "../runtime/catalog.js";
import {getErrorMessage} from "../runtime/errors.js";
import {formatOutcome, truncate} from "../utils/format.js";
import {createLogger, type Logger} from "../utils/logger.js";

export interface TurnPayload {
  text: string;
  state: TurnState;
  action?: CandidateAction;
  outcome?: Outcome;
  cancelled?: boolean;
}

export interface TurnResult {
  status: "ok" | "error";
  payload: TurnPayload;
}

export interface TurnHandlerOptions {
  gateway: ClassifierGateway;
  dispatcher: Dispatcher;
  memory: ConversationMemory;
  catalog: Catalog;
  /** Rewrites successful results before they are shown; memory keeps the local text. */
  formatter?: ResultFormatter;
  /** Rebuilds the catalog; without it `refreshCatalog` keeps the current one. */
  discover?: (signal?: AbortSignal) => Promise<Catalog>;
  onStateChange?: (state: TurnState, query: string) => void;
  resultSummaryLength?: number;
  logger?: Logger;
}

export interface HandleOptions {
  signal?: AbortSignal;
}

/**
 * Runs one query through classification and dispatch, then records the
 * exchange. Calls are serialised: a turn, or a catalog refresh, waits for
 * the one before it to finish.
 */
export class TurnHandler {
  private readonly gateway: ClassifierGateway;
  private readonly dispatcher: Dispatcher;
  private readonly memory: ConversationMemory;
  private readonly formatter?: ResultFormatter;
  private readonly discover?: (signal?: AbortSignal) => Promise<Catalog>;
  private readonly onStateChange?: (state: TurnState, query: string) => void;
  private readonly resultSummaryLength: number;
  private readonly logger: Logger;
  private currentCatalog: Catalog;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: TurnHandlerOptions) {
    this.gateway = options.gateway;
    this.dispatcher = options.dispatcher;
    this.memory = options.memory;
    this.currentCatalog = options.catalog;
    this.formatter = options.formatter;
    this.discover = options.discover;
    this.onStateChange = options.onStateChange;
    this.resultSummaryLength = options.resultSummaryLength ?? 500;
    this.logger = options.logger ?? createLogger("Turn");
  }

  get catalog(): Catalog {
    return this.currentCatalog;
  }

  handle(query: string, options: HandleOptions = {}): Promise<TurnResult> {
    return this.serialize(() => this.run(query.trim(), options.signal));
  }

  /** Replaces the catalog wholesale, between turns. */
  refreshCatalog(signal?: AbortSignal): Promise<Catalog> {
    return this.serialize(async () => {
      if (!this.discover) {
        return this.currentCatalog;
      }
      this.currentCatalog = await this.discover(signal);
      return this.currentCatalog;
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async run(query: string, signal?: AbortSignal): Promise<TurnResult> {
    const catalog = this.currentCatalog;
    let state: TurnState = "Received";
    const enter = (next: TurnState) => {
      state = next;
      this.logger.debug(`${next}: ${query}`);
      this.onStateChange?.(next, query);
    };
    const cancelled = (action?: CandidateAction): TurnResult => {
      this.logger.debug(`Cancelled in ${state}: ${query}`);
      return {status: "error", payload: {text: "Turn cancelled.", state, cancelled: true, ...(action ? {action} : {})}};
    };

    enter("Received");
    if (signal?.aborted) {
      return cancelled();
    }

    enter("Classifying");
    let candidate: CandidateAction;
    try {
      candidate = await this.gateway.classify(query, this.memory.recent(), catalog, {signal});
    } catch (error) {
      if (signal?.aborted) {
        return cancelled();
      }
      throw error;
    }
    if (signal?.aborted) {
      return cancelled(candidate);
    }

    if (candidate.kind === "error") {
      const outcome = await this.dispatcher.resolveAndExecute(candidate, catalog, {query});
      enter("ClassificationFailed");
      return {status: "error", payload: {text: formatOutcome(outcome), state, action: candidate, outcome}};
    }

    enter("Validating");
    const resolved = this.dispatcher.resolve(candidate, catalog, query);

    let outcome: Outcome;
    if (resolved.kind === "failure") {
      outcome = resolved;
    } else {
      enter("Dispatching");
      try {
        outcome = await this.dispatcher.execute(resolved, catalog, {signal});
      } catch (error) {
        if (signal?.aborted) {
          return cancelled(candidate);
        }
        this.logger.error(`Unexpected dispatch error: ${getErrorMessage(error)}`);
        enter("Failed");
        return {status: "error", payload: {text: `Unexpected error: ${getErrorMessage(error)}`, state, action: candidate}};
      }
      if (signal?.aborted) {
        return cancelled(candidate);
      }
    }

    const localText = formatOutcome(outcome);
    let text = localText;
    if (this.formatter) {
      try {
        text = await this.formatter.format(query, outcome, localText, {signal});
      } catch (error) {
        if (signal?.aborted) {
          return cancelled(candidate);
        }
        throw error;
      }
    }

    this.memory.append({
      query,
      action: describeAction(candidate),
      result: truncate(localText, this.resultSummaryLength)
    });
    enter(outcome.kind === "failure" ? "Failed" : "Succeeded");
    return {status: outcome.kind === "failure" ? "error" : "ok", payload: {text, state, action: candidate, outcome}};
  }
}
