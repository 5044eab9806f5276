/* eslint-disable no-console */
import {startSession} from "./bootstrap.js";
import {executeSlashCommand} from "./commands/executor.js";
import type {ParsedArgs} from "./parseArgs.js";

/** Answers a single query and returns the process exit code. */
export async function runOnce(options: ParsedArgs): Promise<number> {
  if (!options.query) {
    console.error("A query is required with --no-interactive. Run with --help for usage.");
    return 2;
  }

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    const {session, auth} = await startSession(options, {signal: controller.signal});
    auth.warnings.forEach((warning) => console.warn(warning));

    if (options.query.startsWith("/")) {
      const result = await executeSlashCommand(options.query, session, controller.signal);
      console.log(options.json ? JSON.stringify({lines: result.lines, isError: result.isError ?? false}) : result.lines.join("\n"));
      return result.isError ? 1 : 0;
    }

    const result = await session.turns.handle(options.query, {signal: controller.signal});
    console.log(options.json ? JSON.stringify(result, null, 2) : result.payload.text);
    return result.status === "ok" ? 0 : 1;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
