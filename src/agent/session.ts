import {ClassifierGateway, type Classifier} from "./classifier.js";
import {Dispatcher} from "./dispatcher.js";
import {ResultFormatter} from "./formatter.js";
import {createModelClassifier, type TokenUsage} from "./modelClient.js";
import {TurnHandler} from "./turnHandler.js";
import type {TurnState} from "./types.js";
import {ConversationMemory} from "../chat/memory.js";
import type {AgentConfig} from "../config.js";
import {discoverCatalog, type Catalog} from "../runtime/catalog.js";
import {McpClient, type CapabilityServer} from "../runtime/mcp.js";
import {createLogger} from "../utils/logger.js";

export interface AgentSession {
  config: AgentConfig;
  server: CapabilityServer;
  memory: ConversationMemory;
  dispatcher: Dispatcher;
  turns: TurnHandler;
  readonly catalog: Catalog;
}

export interface CreateSessionOptions {
  token?: string;
  /** Replaces the network client, e.g. with an in-process server. */
  server?: CapabilityServer;
  /** Replaces the LLM-backed classifier. */
  classifier?: Classifier;
  onStateChange?: (state: TurnState, query: string) => void;
  onUsage?: (usage: TokenUsage) => void;
  signal?: AbortSignal;
}

/**
 * Wires the client, catalog, classifier, dispatcher and memory for one
 * session and runs the initial discovery.
 */
export async function createAgentSession(config: AgentConfig, options: CreateSessionOptions = {}): Promise<AgentSession> {
  const server =
    options.server ??
    new McpClient({
      endpoint: config.serverUrl,
      token: options.token,
      timeoutMs: config.requestTimeoutMs,
      toolArgumentsKey: config.toolArgumentsKey
    });

  const classifier =
    options.classifier ??
    createModelClassifier({
      provider: config.provider,
      model: config.model,
      maxTokens: config.classifierMaxTokens,
      temperature: config.classifierTemperature,
      onUsage: options.onUsage
    });

  const logger = createLogger("Session");
  const discover = (signal?: AbortSignal) => discoverCatalog(server, {signal});
  const catalog = await discover(options.signal);
  logger.debug(
    `Catalog ready: ${catalog.tools.length} tools, ${catalog.resources.length} resources, ${catalog.prompts.length} prompts`
  );

  const memory = new ConversationMemory(config.memorySize);
  const dispatcher = new Dispatcher({server, transportRetries: config.transportRetries});
  const gateway = new ClassifierGateway({
    classifier,
    instructions: config.instructions,
    historyWindow: config.historyWindow,
    timeoutMs: config.classifierTimeoutMs
  });
  const formatter = config.formatterInstructions
    ? new ResultFormatter({classifier, instructions: config.formatterInstructions, timeoutMs: config.classifierTimeoutMs})
    : undefined;
  const turns = new TurnHandler({
    gateway,
    dispatcher,
    memory,
    catalog,
    formatter,
    discover,
    onStateChange: options.onStateChange
  });

  return {
    config,
    server,
    memory,
    dispatcher,
    turns,
    get catalog() {
      return turns.catalog;
    }
  };
}

export {ClassifierGateway, Dispatcher, ResultFormatter, TurnHandler, ConversationMemory, McpClient, discoverCatalog};
export type {Classifier, CapabilityServer, Catalog};
export type {CandidateAction, Outcome, ResolvedAction, TurnState} from "./types.js";
export type {TurnResult, TurnPayload} from "./turnHandler.js";
