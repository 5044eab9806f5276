import Anthropic from "@anthropic-ai/sdk";
import {InvokeModelCommand} from "@aws-sdk/client-bedrock-runtime";
import {z} from "zod";

import {getAnthropicClient} from "./anthropicClient.js";
import {getBedrockClient} from "./bedrockClient.js";
import type {Classifier} from "./classifier.js";
import {ClassifierError} from "../runtime/errors.js";

export type ModelProvider = "bedrock" | "anthropic";

export interface CompletionRequest {
  model: string;
  system: string;
  prompt: string;
  maxTokens: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

export interface CompletionResponse {
  text: string;
  stopReason?: string;
  usage?: TokenUsage;
}

const bedrockResponseSchema = z.object({
  content: z.array(z.object({type: z.string(), text: z.string().optional()}).passthrough()).default([]),
  stop_reason: z.string().nullish(),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional()
    })
    .optional()
});

export async function sendMessage(provider: ModelProvider, request: CompletionRequest): Promise<CompletionResponse> {
  if (provider === "bedrock") {
    return sendBedrockMessage(request);
  }
  return sendAnthropicMessage(request);
}

async function sendBedrockMessage(request: CompletionRequest): Promise<CompletionResponse> {
  const client = getBedrockClient();

  const body = {
    anthropic_version: "bedrock-2023-05-31",
    max_tokens: request.maxTokens,
    system: request.system,
    messages: [{role: "user", content: request.prompt}],
    ...(request.temperature !== undefined ? {temperature: request.temperature} : {})
  };

  const command = new InvokeModelCommand({
    modelId: request.model,
    contentType: "application/json",
    accept: "application/json",
    body: JSON.stringify(body)
  });

  let decoded: unknown;
  try {
    const response = await client.send(command, {abortSignal: request.signal});
    decoded = JSON.parse(new TextDecoder().decode(response.body));
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
    if (error.name === "AccessDeniedException") {
      throw new ClassifierError(
        "Amazon Bedrock",
        "access denied. Ensure your IAM user/role has 'bedrock:InvokeModel' permission and model access is enabled."
      );
    }
    if (error.name === "ResourceNotFoundException") {
      throw new ClassifierError(
        "Amazon Bedrock",
        `model '${request.model}' not found in region ${process.env.AWS_REGION || "us-east-1"}.`
      );
    }
    if (error.name === "ValidationException") {
      throw new ClassifierError("Amazon Bedrock", `invalid request: ${error.message}`);
    }
    throw error;
  }

  const parsed = bedrockResponseSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ClassifierError("Amazon Bedrock", "unexpected response body");
  }

  const {content, stop_reason: stopReason, usage} = parsed.data;
  return {
    text: content.flatMap((block) => (block.type === "text" && block.text ? [block.text] : [])).join("\n"),
    ...(stopReason ? {stopReason} : {}),
    ...(usage ? {usage: toUsage(usage.input_tokens ?? 0, usage.output_tokens ?? 0)} : {})
  };
}

async function sendAnthropicMessage(request: CompletionRequest): Promise<CompletionResponse> {
  const client = getAnthropicClient();

  try {
    const response = await client.messages.create(
      {
        model: request.model,
        system: request.system,
        max_tokens: request.maxTokens,
        messages: [{role: "user", content: request.prompt}],
        ...(request.temperature !== undefined ? {temperature: request.temperature} : {})
      },
      {signal: request.signal}
    );

    return {
      text: response.content.flatMap((block) => (block.type === "text" ? [block.text] : [])).join("\n"),
      ...(response.stop_reason ? {stopReason: response.stop_reason} : {}),
      usage: toUsage(response.usage.input_tokens, response.usage.output_tokens)
    };
  } catch (error) {
    if (error instanceof Anthropic.APIError) {
      if (error.status === 401) {
        throw new ClassifierError("Anthropic API", "authentication failed. Check that ANTHROPIC_API_KEY is valid.");
      }
      if (error.status === 429) {
        throw new ClassifierError("Anthropic API", "rate limit exceeded. Wait a moment before trying again.");
      }
    }
    throw error;
  }
}

function toUsage(input: number, output: number): TokenUsage {
  return {input_tokens: input, output_tokens: output, total_tokens: input + output};
}

export function getDefaultProvider(env: NodeJS.ProcessEnv = process.env): ModelProvider {
  const hasAwsCredentials = env.AWS_ACCESS_KEY_ID || env.AWS_SECRET_ACCESS_KEY || env.AWS_PROFILE;
  if (hasAwsCredentials) {
    return "bedrock";
  }
  if (env.ANTHROPIC_API_KEY) {
    return "anthropic";
  }
  return "bedrock";
}

export function getDefaultModel(provider: ModelProvider, env: NodeJS.ProcessEnv = process.env): string {
  if (provider === "bedrock") {
    // Claude 4+ models on Bedrock need an inference profile id (us.anthropic.*)
    return env.BEDROCK_MODEL_ID || "us.anthropic.claude-haiku-4-5-20251001-v1:0";
  }
  return env.ANTHROPIC_MODEL || "claude-haiku-4-5-20251001";
}

export const CLASSIFIER_SYSTEM_PROMPT =
  "You classify requests for an MCP client. Reply with exactly one JSON object and no other text.";

export interface ModelClassifierOptions {
  provider: ModelProvider;
  model: string;
  maxTokens?: number;
  temperature?: number;
  onUsage?: (usage: TokenUsage) => void;
}

/** The classifier service backed by one LLM provider for the whole session. */
export function createModelClassifier(options: ModelClassifierOptions): Classifier {
  return {
    async complete(prompt, completeOptions = {}) {
      const response = await sendMessage(options.provider, {
        model: options.model,
        system: CLASSIFIER_SYSTEM_PROMPT,
        prompt,
        maxTokens: options.maxTokens ?? 512,
        temperature: options.temperature ?? 0,
        signal: completeOptions.signal
      });
      if (response.usage) {
        options.onUsage?.(response.usage);
      }
      return response.text;
    }
  };
}
