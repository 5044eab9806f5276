import {promises as fs} from "node:fs";
import path from "node:path";

export type TokenSource = "none" | "explicit" | "token-file" | "env";

export interface AuthContext {
  token?: string;
  source: TokenSource;
  tokenFile?: string;
  warnings: string[];
}

export interface ResolveAuthOptions {
  explicitToken?: string;
  tokenFile?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Bearer token for the capability server. Precedence: --token, then
 * --token-file, then MCP_TOKEN. A server without auth needs none of them.
 */
export async function resolveAuth(options: ResolveAuthOptions = {}): Promise<AuthContext> {
  const warnings: string[] = [];
  const env = options.env ?? process.env;

  if (options.explicitToken) {
    return {token: options.explicitToken, source: "explicit", warnings};
  }

  if (options.tokenFile) {
    const loaded = await loadTokenFromPlainFile(options.tokenFile);
    if (loaded.token) {
      return {token: loaded.token, source: "token-file", tokenFile: options.tokenFile, warnings};
    }
    warnings.push(`Failed to read token file ${options.tokenFile}: ${loaded.reason}`);
  }

  const envToken = env.MCP_TOKEN?.trim();
  if (envToken) {
    return {token: envToken, source: "env", warnings};
  }

  return {source: "none", warnings};
}

async function loadTokenFromPlainFile(filePath: string): Promise<{token?: string; reason?: string}> {
  let content: string;
  try {
    content = await fs.readFile(path.resolve(filePath), "utf-8");
  } catch (error) {
    const code = error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;
    return {reason: code ?? "unreadable"};
  }
  const token = content.trim();
  return token.length > 0 ? {token} : {reason: "file is empty"};
}
