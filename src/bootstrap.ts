import {createAgentSession, type AgentSession, type CreateSessionOptions} from "./agent/session.js";
import {resolveAuth, type AuthContext} from "./auth.js";
import {loadConfig} from "./config.js";
import type {ParsedArgs} from "./parseArgs.js";
import {setDebugLogging} from "./utils/logger.js";

export interface StartedSession {
  session: AgentSession;
  auth: AuthContext;
}

export type SessionHooks = Pick<CreateSessionOptions, "onStateChange" | "onUsage" | "signal">;

/** Loads configuration and credentials, then connects and discovers the catalog. */
export async function startSession(options: ParsedArgs, hooks: SessionHooks = {}): Promise<StartedSession> {
  const config = loadConfig({
    configFile: options.configFile,
    overrides: {
      serverUrl: options.url,
      provider: options.provider,
      model: options.model,
      memorySize: options.memorySize,
      debug: options.debug ? true : undefined
    }
  });
  setDebugLogging(config.debug);

  const auth = await resolveAuth({explicitToken: options.token, tokenFile: options.tokenFile});
  const session = await createAgentSession(config, {token: auth.token, ...hooks});
  return {session, auth};
}
