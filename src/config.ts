import {existsSync, readFileSync} from "node:fs";
import {z} from "zod";

import {getDefaultModel, getDefaultProvider} from "./agent/modelClient.js";
import {defaultConfigFile} from "./paths.js";
import {ConfigError, getErrorMessage} from "./runtime/errors.js";

export const DEFAULT_MCP_SERVER = "http://localhost:8000/mcp/";

const configSchema = z.object({
  serverUrl: z.string().url(),
  provider: z.enum(["bedrock", "anthropic"]),
  model: z.string().min(1),
  memorySize: z.coerce.number().int().min(1).max(100),
  historyWindow: z.coerce.number().int().min(0).max(100),
  requestTimeoutMs: z.coerce.number().int().positive(),
  classifierTimeoutMs: z.coerce.number().int().positive(),
  classifierMaxTokens: z.coerce.number().int().positive(),
  classifierTemperature: z.coerce.number().min(0).max(1),
  transportRetries: z.coerce.number().int().min(0).max(1),
  toolArgumentsKey: z.enum(["arguments", "params"]),
  instructions: z.string().min(1).optional(),
  formatterInstructions: z.string().min(1).optional(),
  debug: z.boolean()
});

export type AgentConfig = z.infer<typeof configSchema>;

type ConfigKey = keyof AgentConfig;
export type ConfigOverrides = Partial<Record<ConfigKey, unknown>>;

const DEFAULTS = {
  serverUrl: DEFAULT_MCP_SERVER,
  memorySize: 5,
  historyWindow: 5,
  requestTimeoutMs: 30_000,
  classifierTimeoutMs: 60_000,
  classifierMaxTokens: 512,
  classifierTemperature: 0,
  transportRetries: 1,
  toolArgumentsKey: "arguments",
  debug: false
} satisfies ConfigOverrides;

const ENV_KEYS: Array<[ConfigKey, string[]]> = [
  ["serverUrl", ["MCP_SERVER_URL", "DEFAULT_MCP_SERVER"]],
  ["provider", ["MODEL_PROVIDER"]],
  ["model", ["DEFAULT_MODEL"]],
  ["memorySize", ["MCP_MEMORY_SIZE"]],
  ["historyWindow", ["MCP_HISTORY_WINDOW"]],
  ["requestTimeoutMs", ["MCP_REQUEST_TIMEOUT_MS"]],
  ["classifierTimeoutMs", ["MCP_CLASSIFIER_TIMEOUT_MS"]],
  ["classifierMaxTokens", ["MCP_CLASSIFIER_MAX_TOKENS"]],
  ["classifierTemperature", ["MCP_CLASSIFIER_TEMPERATURE"]],
  ["transportRetries", ["MCP_TRANSPORT_RETRIES"]],
  ["toolArgumentsKey", ["MCP_TOOL_ARGS_KEY"]],
  ["debug", ["MCP_AGENT_DEBUG"]]
];

const FILE_KEYS: Array<[ConfigKey, string]> = [
  ["serverUrl", "default_mcp_server"],
  ["provider", "model_provider"],
  ["model", "default_model"],
  ["memorySize", "memory_size"],
  ["historyWindow", "history_window"],
  ["requestTimeoutMs", "request_timeout_ms"],
  ["classifierTimeoutMs", "classifier_timeout_ms"],
  ["classifierMaxTokens", "classifier_max_tokens"],
  ["classifierTemperature", "classifier_temperature"],
  ["transportRetries", "transport_retries"],
  ["toolArgumentsKey", "tool_arguments_key"],
  ["debug", "debug"]
];

const configFileSchema = z
  .object({
    orchestrator_prompts: z.array(z.string()).optional(),
    formatter_prompts: z.array(z.string()).optional()
  })
  .passthrough();

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Path to config.json; `false` skips the file. Defaults to ./config.json. */
  configFile?: string | false;
  /** Command-line values, applied last. */
  overrides?: ConfigOverrides;
}

/**
 * Environment first, then non-empty keys of config.json, then command-line
 * overrides. Throws `ConfigError` when the merged result is invalid.
 */
export function loadConfig(options: LoadConfigOptions = {}): AgentConfig {
  const env = options.env ?? process.env;
  const merged: ConfigOverrides = {...DEFAULTS};

  for (const [key, names] of ENV_KEYS) {
    const value = names.map((name) => env[name]).find((candidate) => candidate !== undefined && candidate.trim() !== "");
    if (value !== undefined) {
      merged[key] = key === "debug" ? parseFlag(value) : value.trim();
    }
  }

  const configFile = options.configFile === undefined ? defaultConfigFile() : options.configFile;
  if (configFile !== false) {
    Object.assign(merged, readConfigFile(configFile));
  }

  for (const key of configSchema.keyof().options) {
    const value = options.overrides?.[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  merged.provider ??= getDefaultProvider(env);
  if (merged.model === undefined && (merged.provider === "bedrock" || merged.provider === "anthropic")) {
    merged.model = getDefaultModel(merged.provider, env);
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${getErrorMessage(parsed.error)}`);
  }

  return {...parsed.data, serverUrl: withTrailingSlash(parsed.data.serverUrl)};
}

function readConfigFile(filePath: string): ConfigOverrides {
  if (!existsSync(filePath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read ${filePath}: ${getErrorMessage(error)}`);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${filePath}: ${getErrorMessage(parsed.error)}`);
  }

  const values: ConfigOverrides = {};
  for (const [key, fileKey] of FILE_KEYS) {
    const value = parsed.data[fileKey];
    if (value !== undefined && value !== null && value !== "") {
      values[key] = value;
    }
  }
  const prompts = parsed.data.orchestrator_prompts;
  if (prompts && prompts.length > 0) {
    values.instructions = prompts.join("\n");
  }
  const formatterPrompts = parsed.data.formatter_prompts;
  if (formatterPrompts && formatterPrompts.length > 0) {
    values.formatterInstructions = formatterPrompts.join("\n");
  }
  return values;
}

function parseFlag(value: string): boolean {
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function withTrailingSlash(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}
