import {BedrockRuntimeClient} from "@aws-sdk/client-bedrock-runtime";

let cachedClient: BedrockRuntimeClient | null = null;

export function getBedrockClient(): BedrockRuntimeClient {
  if (cachedClient) {
    return cachedClient;
  }

  // Credentials come from the default provider chain: environment variables,
  // ~/.aws/credentials (optionally AWS_PROFILE) or instance metadata.
  const region = process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || "us-east-1";
  const profile = process.env.AWS_PROFILE;

  cachedClient = new BedrockRuntimeClient({
    region,
    ...(profile ? {profile} : {})
  });

  return cachedClient;
}
