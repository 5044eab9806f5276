import type {FailureOutcome, Outcome} from "../agent/types.js";
import type {CatalogEntry} from "../runtime/catalog.js";
import {formatSignature} from "../runtime/schema.js";
import {isJsonObject, type CapabilityCategory, type JsonObject} from "../types/mcp.js";

const CATEGORY_LABELS: Record<CapabilityCategory, string> = {
  tools: "Tools",
  resources: "Resources",
  prompts: "Prompts"
};

/**
 * Text carried by an MCP tool result (`content`) or resource read
 * (`contents`). Binary parts are shown as a placeholder.
 */
export function contentText(payload: JsonObject): string | undefined {
  const parts = Array.isArray(payload.content) ? payload.content : Array.isArray(payload.contents) ? payload.contents : [];
  const texts = parts.flatMap((part): string[] => {
    if (!isJsonObject(part)) {
      return [];
    }
    if (typeof part.text === "string") {
      return [part.text];
    }
    if (typeof part.blob === "string") {
      return [`[binary content${typeof part.mimeType === "string" ? ` ${part.mimeType}` : ""}]`];
    }
    return [];
  });
  return texts.length > 0 ? texts.join("\n") : undefined;
}

export function formatEntries(category: CapabilityCategory, entries: readonly CatalogEntry[]): string {
  if (entries.length === 0) {
    return `No ${category} available`;
  }
  return [`${CATEGORY_LABELS[category]}:`, ...entries.map(formatEntry)].join("\n");
}

function formatEntry(entry: CatalogEntry): string {
  switch (entry.kind) {
    case "tool": {
      const signature = formatSignature(entry.schema);
      return `- ${entry.name}${signature ? `(${signature})` : ""}: ${entry.description}`;
    }
    case "resource":
      return `- ${entry.uri}: ${entry.description}`;
    case "prompt":
      return `- ${entry.name}: ${entry.description}`;
  }
}

export function formatFailure(outcome: FailureOutcome): string {
  const lines = [`${outcome.failure}: ${outcome.message}`];
  if (outcome.detail) {
    const {code, status, message} = outcome.detail;
    const qualifier = code !== undefined ? ` (code ${code})` : status !== undefined ? ` (HTTP ${status})` : "";
    lines.push(`Details${qualifier}: ${message}`);
  }
  if (outcome.suggestions && outcome.suggestions.length > 0) {
    lines.push(`Closest available capabilities: ${outcome.suggestions.join(", ")}`);
  }
  return lines.join("\n");
}

export function formatOutcome(outcome: Outcome): string {
  switch (outcome.kind) {
    case "list_result":
      return formatEntries(outcome.category, outcome.entries);
    case "tool_result":
    case "resource_content":
      return contentText(outcome.payload) ?? formatJson(outcome.payload);
    case "failure":
      return formatFailure(outcome);
  }
}

export function formatJson(data: unknown, raw = false): string {
  if (raw) {
    return typeof data === "string" ? data : JSON.stringify(data);
  }
  return JSON.stringify(data, null, 2);
}

export function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}
