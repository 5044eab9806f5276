import path from "node:path";

export function defaultConfigFile(cwd: string = process.cwd()): string {
  return path.join(cwd, "config.json");
}
