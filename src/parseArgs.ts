export interface ParsedArgs {
  url?: string;
  tokenFile?: string;
  token?: string;
  provider?: string;
  model?: string;
  memorySize?: string;
  configFile?: string;
  query?: string;
  json?: boolean;
  debug?: boolean;
  interactive: boolean;
  helpRequested?: boolean;
  unknown: string[];
}

export const HELP_TEXT = `
Usage
  mcp-agent [options] [query]

Without a query the agent starts an interactive chat. With a query it
answers once and exits.

Options
  --url, -u <url>          MCP server endpoint (default: http://localhost:8000/mcp/)
  --token-file, -t <path>  Path to a file containing a bearer token
  --token <value>          Explicit bearer token (overrides token file)
  --provider <name>        Classifier provider: bedrock or anthropic
  --model <id>             Classifier model id
  --memory-size <n>        Number of past turns to remember (default: 5)
  --config <path>          Path to config.json (default: ./config.json)
  --json                   Print the turn result as JSON
  --debug                  Log state transitions and protocol traffic
  --interactive            Force interactive mode even when a query is given
  --no-interactive         Force non-interactive mode
  --help, -h               Show this help message
`.trim();

type ValueOption = "url" | "tokenFile" | "token" | "provider" | "model" | "memorySize" | "configFile";

const VALUE_OPTIONS = new Map<string, ValueOption>([
  ["--url", "url"],
  ["-u", "url"],
  ["--token-file", "tokenFile"],
  ["-t", "tokenFile"],
  ["--token", "token"],
  ["--provider", "provider"],
  ["--model", "model"],
  ["--memory-size", "memorySize"],
  ["--config", "configFile"]
]);

export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    interactive: true,
    unknown: []
  };
  const words: string[] = [];
  let forcedInteractive: boolean | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    const option = VALUE_OPTIONS.get(arg);
    if (option) {
      const value = argv[i + 1];
      if (value === undefined) {
        result.unknown.push(arg);
      } else {
        result[option] = value;
        i += 1;
      }
      continue;
    }

    switch (arg) {
      case "--json":
        result.json = true;
        break;
      case "--debug":
        result.debug = true;
        break;
      case "--interactive":
        forcedInteractive = true;
        break;
      case "--no-interactive":
        forcedInteractive = false;
        break;
      case "--help":
      case "-h":
        result.helpRequested = true;
        break;
      default:
        if (arg.startsWith("-") && arg.length > 1) {
          result.unknown.push(arg);
        } else {
          words.push(arg);
        }
    }
  }

  if (words.length > 0) {
    result.query = words.join(" ");
  }
  result.interactive = result.helpRequested ? false : forcedInteractive ?? result.query === undefined;
  return result;
}
