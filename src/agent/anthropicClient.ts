import Anthropic from "@anthropic-ai/sdk";

import {ConfigError} from "../runtime/errors.js";

let cachedClient: Anthropic | null = null;

export function getAnthropicClient(): Anthropic {
  if (cachedClient) {
    return cachedClient;
  }

  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new ConfigError("ANTHROPIC_API_KEY is not set. Export it or switch MODEL_PROVIDER to bedrock.");
  }

  // ANTHROPIC_BASE_URL is picked up by the SDK itself
  cachedClient = new Anthropic({apiKey, maxRetries: 2});
  return cachedClient;
}
