/* eslint-disable no-console */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let debugEnabled = process.env.MCP_AGENT_DEBUG === "1" || process.env.MCP_AGENT_DEBUG === "true";

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

/**
 * Console logger with a `[Tag]` prefix on every line. Debug output is off
 * unless MCP_AGENT_DEBUG is set or `--debug` is passed.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ...details) {
      if (debugEnabled) {
        console.debug(prefix, message, ...details);
      }
    },
    info(message, ...details) {
      console.info(prefix, message, ...details);
    },
    warn(message, ...details) {
      console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      console.error(prefix, message, ...details);
    }
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {}
};
