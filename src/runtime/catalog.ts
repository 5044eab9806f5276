import {z} from "zod";

import type {CallOptions, CapabilityServer} from "./mcp.js";
import {getErrorMessage, isAbortError, isProtocolError} from "./errors.js";
import {describeInputSchema, type InputSchema} from "./schema.js";
import {createLogger, type Logger} from "../utils/logger.js";
import {CAPABILITY_CATEGORIES, type CapabilityCategory, type JsonObject} from "../types/mcp.js";

export interface ToolEntry {
  kind: "tool";
  name: string;
  description: string;
  /** The schema exactly as the server published it. */
  inputSchema: unknown;
  schema: InputSchema;
}

export interface ResourceEntry {
  kind: "resource";
  uri: string;
  name?: string;
  description: string;
  mimeType?: string;
}

export interface PromptArgument {
  name: string;
  description?: string;
  required: boolean;
}

export interface PromptEntry {
  kind: "prompt";
  name: string;
  description: string;
  arguments: PromptArgument[];
}

export type CatalogEntry = ToolEntry | ResourceEntry | PromptEntry;

export interface CatalogWarning {
  category: CapabilityCategory;
  message: string;
}

/**
 * The capabilities discovered for the session. Immutable; a refresh builds
 * a new instance.
 */
export class Catalog {
  readonly tools: readonly ToolEntry[];
  readonly resources: readonly ResourceEntry[];
  readonly prompts: readonly PromptEntry[];
  readonly warnings: readonly CatalogWarning[];

  constructor(
    tools: readonly ToolEntry[],
    resources: readonly ResourceEntry[],
    prompts: readonly PromptEntry[],
    warnings: readonly CatalogWarning[] = []
  ) {
    this.tools = Object.freeze([...tools]);
    this.resources = Object.freeze([...resources]);
    this.prompts = Object.freeze([...prompts]);
    this.warnings = Object.freeze([...warnings]);
    Object.freeze(this);
  }

  static empty(): Catalog {
    return new Catalog([], [], []);
  }

  list(category: "tools"): readonly ToolEntry[];
  list(category: "resources"): readonly ResourceEntry[];
  list(category: "prompts"): readonly PromptEntry[];
  list(category: CapabilityCategory): readonly CatalogEntry[];
  list(category: CapabilityCategory): readonly CatalogEntry[] {
    switch (category) {
      case "tools":
        return this.tools;
      case "resources":
        return this.resources;
      case "prompts":
        return this.prompts;
    }
  }

  lookupTool(name: string): ToolEntry | undefined {
    return this.tools.find((tool) => tool.name === name);
  }

  lookupResource(uri: string): ResourceEntry | undefined {
    return this.resources.find((resource) => resource.uri === uri);
  }

  lookupPrompt(name: string): PromptEntry | undefined {
    return this.prompts.find((prompt) => prompt.name === name);
  }

  /** Tool and prompt names, resource URIs. */
  names(category: CapabilityCategory): string[] {
    return this.list(category).map(entryKey);
  }

  isEmpty(): boolean {
    return this.tools.length === 0 && this.resources.length === 0 && this.prompts.length === 0;
  }

  /** Content equality; ordering is ignored. */
  equals(other: Catalog): boolean {
    return CAPABILITY_CATEGORIES.every((category) => {
      const mine = this.list(category).map(fingerprint).sort();
      const theirs = other.list(category).map(fingerprint).sort();
      return mine.length === theirs.length && mine.every((value, index) => value === theirs[index]);
    });
  }
}

export function entryKey(entry: CatalogEntry): string {
  return entry.kind === "resource" ? entry.uri : entry.name;
}

function fingerprint(entry: CatalogEntry): string {
  switch (entry.kind) {
    case "tool":
      return JSON.stringify([entry.name, entry.description, entry.inputSchema ?? null]);
    case "resource":
      return JSON.stringify([entry.uri, entry.name ?? null, entry.description]);
    case "prompt":
      return JSON.stringify([entry.name, entry.description, entry.arguments]);
  }
}

const toolSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().nullish(),
    inputSchema: z.unknown().optional(),
    input_schema: z.unknown().optional()
  })
  .passthrough();

const resourceSchema = z
  .object({
    uri: z.string().min(1),
    name: z.string().nullish(),
    description: z.string().nullish(),
    mimeType: z.string().nullish()
  })
  .passthrough();

const promptSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().nullish(),
    arguments: z
      .array(
        z.object({
          name: z.string(),
          description: z.string().nullish(),
          required: z.boolean().nullish()
        })
      )
      .nullish()
  })
  .passthrough();

export interface DiscoverOptions extends CallOptions {
  logger?: Logger;
  maxPages?: number;
}

const DEFAULT_MAX_PAGES = 20;

/**
 * Lists tools, resources and prompts. A category whose listing fails is
 * left empty and recorded in `warnings`, so a server without resources
 * still exposes its tools.
 */
export async function discoverCatalog(server: CapabilityServer, options: DiscoverOptions = {}): Promise<Catalog> {
  const logger = options.logger ?? createLogger("Catalog");
  const warnings: CatalogWarning[] = [];

  const fetchCategory = async (category: CapabilityCategory): Promise<unknown[]> => {
    const page = (cursor?: string): Promise<JsonObject> => {
      const callOptions: CallOptions = {signal: options.signal};
      switch (category) {
        case "tools":
          return server.listTools(cursor, callOptions);
        case "resources":
          return server.listResources(cursor, callOptions);
        case "prompts":
          return server.listPrompts(cursor, callOptions);
      }
    };

    try {
      return await collectPages(category, page, options.maxPages ?? DEFAULT_MAX_PAGES, warnings);
    } catch (error) {
      if (isAbortError(error, options.signal)) {
        throw error;
      }
      const reason = isProtocolError(error) ? error.describe() : getErrorMessage(error);
      warnings.push({category, message: `${category} discovery failed: ${reason}`});
      return [];
    }
  };

  const rawTools = await fetchCategory("tools");
  const rawResources = await fetchCategory("resources");
  const rawPrompts = await fetchCategory("prompts");

  const tools = dedupe("tools", rawTools.flatMap((raw) => toToolEntry(raw, warnings)), warnings);
  const resources = dedupe("resources", rawResources.flatMap((raw) => toResourceEntry(raw, warnings)), warnings);
  const prompts = dedupe("prompts", rawPrompts.flatMap((raw) => toPromptEntry(raw, warnings)), warnings);

  for (const warning of warnings) {
    logger.warn(warning.message);
  }
  logger.debug("Discovered tools:", tools.map((tool) => tool.name));
  logger.debug("Discovered resources:", resources.map((resource) => resource.uri));
  logger.debug("Discovered prompts:", prompts.map((prompt) => prompt.name));

  return new Catalog(tools, resources, prompts, warnings);
}

async function collectPages(
  category: CapabilityCategory,
  page: (cursor?: string) => Promise<JsonObject>,
  maxPages: number,
  warnings: CatalogWarning[]
): Promise<unknown[]> {
  const items: unknown[] = [];
  const seenCursors = new Set<string>();
  let cursor: string | undefined;

  for (let count = 0; count < maxPages; count += 1) {
    const result = await page(cursor);
    const batch = result[category];
    if (!Array.isArray(batch)) {
      warnings.push({category, message: `${category}/list result has no "${category}" array`});
      return items;
    }
    items.push(...batch);

    const next = result.nextCursor;
    if (typeof next !== "string" || next.length === 0 || seenCursors.has(next)) {
      return items;
    }
    seenCursors.add(next);
    cursor = next;
  }

  warnings.push({category, message: `${category} listing stopped after ${maxPages} pages`});
  return items;
}

function toToolEntry(raw: unknown, warnings: CatalogWarning[]): ToolEntry[] {
  const parsed = toolSchema.safeParse(raw);
  if (!parsed.success) {
    warnings.push({category: "tools", message: "skipped a tool without a name"});
    return [];
  }
  const inputSchema = parsed.data.inputSchema ?? parsed.data.input_schema;
  return [
    {
      kind: "tool",
      name: parsed.data.name,
      description: parsed.data.description ?? "",
      inputSchema,
      schema: describeInputSchema(inputSchema)
    }
  ];
}

function toResourceEntry(raw: unknown, warnings: CatalogWarning[]): ResourceEntry[] {
  const parsed = resourceSchema.safeParse(raw);
  if (!parsed.success) {
    warnings.push({category: "resources", message: "skipped a resource without a uri"});
    return [];
  }
  const entry: ResourceEntry = {kind: "resource", uri: parsed.data.uri, description: parsed.data.description ?? ""};
  if (parsed.data.name) {
    entry.name = parsed.data.name;
  }
  if (parsed.data.mimeType) {
    entry.mimeType = parsed.data.mimeType;
  }
  return [entry];
}

function toPromptEntry(raw: unknown, warnings: CatalogWarning[]): PromptEntry[] {
  const parsed = promptSchema.safeParse(raw);
  if (!parsed.success) {
    warnings.push({category: "prompts", message: "skipped a prompt without a name"});
    return [];
  }
  return [
    {
      kind: "prompt",
      name: parsed.data.name,
      description: parsed.data.description ?? "",
      arguments: (parsed.data.arguments ?? []).map((argument) => ({
        name: argument.name,
        ...(argument.description ? {description: argument.description} : {}),
        required: argument.required ?? false
      }))
    }
  ];
}

function dedupe<T extends CatalogEntry>(category: CapabilityCategory, entries: T[], warnings: CatalogWarning[]): T[] {
  const seen = new Set<string>();
  return entries.filter((entry) => {
    const key = entryKey(entry);
    if (seen.has(key)) {
      warnings.push({category, message: `duplicate ${category} entry "${key}" ignored`});
      return false;
    }
    seen.add(key);
    return true;
  });
}
