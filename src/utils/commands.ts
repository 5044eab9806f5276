/**
 * Available slash commands for autocomplete
 */

export type CommandSection = "Basic" | "Catalog" | "Direct";

export interface CommandOption {
  command: string;
  description: string;
  section: CommandSection;
  /** Arguments shown after the command while it is highlighted. */
  usage?: string;
}

export const AVAILABLE_COMMANDS: CommandOption[] = [
  {command: "/help", description: "Show help message", section: "Basic"},
  {command: "/history", description: "Show recent turns", section: "Basic"},
  {command: "/exit", description: "Exit the CLI", section: "Basic"},
  {command: "/tools", description: "List available tools", section: "Catalog"},
  {command: "/resources", description: "List available resources", section: "Catalog"},
  {command: "/prompts", description: "List available prompts", section: "Catalog"},
  {command: "/refresh", description: "Rediscover server capabilities", section: "Catalog"},
  {command: "/ping", description: "Test server connectivity", section: "Catalog"},
  {command: "/call", description: "Invoke a tool directly", section: "Direct", usage: "<tool> '<json>'"},
  {command: "/read", description: "Read a resource directly", section: "Direct", usage: "<uri>"}
];

/**
 * Get command suggestions based on partial input
 */
export function getCommandSuggestions(input: string): CommandOption[] {
  if (!input.startsWith("/") || input.includes(" ")) {
    return [];
  }

  const normalized = input.toLowerCase();

  return AVAILABLE_COMMANDS.filter((cmd) => cmd.command.toLowerCase().startsWith(normalized)).slice(0, 10);
}

export interface SuggestionRow {
  /** Set on the first suggestion of each section. */
  heading?: CommandSection;
  option: CommandOption;
  selected: boolean;
  label: string;
}

/**
 * Lays suggestions out for display: section headings, padded labels, and
 * the usage hint on the highlighted entry only.
 */
export function layoutSuggestions(suggestions: CommandOption[], selectedIndex: number): SuggestionRow[] {
  const width = Math.max(0, ...suggestions.map((option) => option.command.length));
  let section: CommandSection | undefined;

  return suggestions.map((option, index) => {
    const selected = index === selectedIndex;
    const heading = option.section !== section ? option.section : undefined;
    section = option.section;
    const label = selected && option.usage ? `${option.command} ${option.usage}` : option.command.padEnd(width);
    return {...(heading ? {heading} : {}), option, selected, label};
  });
}
