import {z} from "zod";

import {isJsonObject, type JsonObject} from "../types/mcp.js";

/**
 * Tool input schemas only become known at discovery time, so they are kept
 * as a small description value instead of generated types.
 */
export type FieldKind = "string" | "number" | "integer" | "boolean" | "object" | "array" | "null";

const FIELD_KINDS: readonly FieldKind[] = ["string", "number", "integer", "boolean", "object", "array", "null"];

export interface FieldSpec {
  /** Accepted kinds; empty means any JSON value. */
  kinds: FieldKind[];
  required: boolean;
  description?: string;
  enum?: unknown[];
}

export interface InputSchema {
  fields: Record<string, FieldSpec>;
  allowsAdditional: boolean;
}

export type SchemaProblemReason = "missing" | "type" | "enum" | "unrecognized";

export interface SchemaProblem {
  field: string;
  reason: SchemaProblemReason;
  message: string;
}

const jsonSchemaObject = z
  .object({
    properties: z.record(z.unknown()).optional(),
    required: z.array(z.string()).optional(),
    additionalProperties: z.unknown().optional()
  })
  .passthrough();

const jsonSchemaProperty = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
    enum: z.array(z.unknown()).optional()
  })
  .passthrough();

export const OPEN_INPUT_SCHEMA: InputSchema = {fields: {}, allowsAdditional: true};

/**
 * Reduces a tool's JSON Schema to field kinds and required flags.
 *
 * A tool that publishes no readable schema accepts anything; one that does
 * accepts only its declared properties unless `additionalProperties: true`.
 */
export function describeInputSchema(raw: unknown): InputSchema {
  const parsed = jsonSchemaObject.safeParse(raw);
  if (!parsed.success) {
    return OPEN_INPUT_SCHEMA;
  }

  const required = new Set(parsed.data.required ?? []);
  const entries: Array<[string, FieldSpec]> = [];

  for (const [name, property] of Object.entries(parsed.data.properties ?? {})) {
    const prop = jsonSchemaProperty.safeParse(property);
    const spec: FieldSpec = {kinds: [], required: required.has(name)};
    if (prop.success) {
      spec.kinds = toKinds(prop.data.type);
      if (prop.data.description !== undefined) {
        spec.description = prop.data.description;
      }
      if (prop.data.enum !== undefined) {
        spec.enum = prop.data.enum;
      }
    }
    entries.push([name, spec]);
  }

  const declared = new Set(entries.map(([name]) => name));
  for (const name of required) {
    if (!declared.has(name)) {
      entries.push([name, {kinds: [], required: true}]);
    }
  }

  // fromEntries defines own properties, so names like "__proto__" stay plain keys
  const fields: Record<string, FieldSpec> = Object.fromEntries(entries);
  return {fields, allowsAdditional: parsed.data.additionalProperties === true};
}

function toKinds(type: string | string[] | undefined): FieldKind[] {
  if (type === undefined) {
    return [];
  }
  const names = Array.isArray(type) ? type : [type];
  return FIELD_KINDS.filter((kind) => names.includes(kind));
}

/**
 * Checks classifier-supplied arguments against a tool schema. Every problem
 * is reported; values are never coerced.
 */
export function validateToolInput(input: JsonObject, schema: InputSchema): SchemaProblem[] {
  const problems: SchemaProblem[] = [];

  for (const [name, spec] of Object.entries(schema.fields)) {
    if (!Object.hasOwn(input, name) || input[name] === undefined) {
      if (spec.required) {
        problems.push({field: name, reason: "missing", message: `missing required parameter "${name}"`});
      }
      continue;
    }

    const value = input[name];
    if (spec.kinds.length > 0 && !spec.kinds.some((kind) => matchesKind(value, kind))) {
      problems.push({
        field: name,
        reason: "type",
        message: `parameter "${name}" must be ${spec.kinds.join(" or ")}, got ${kindOf(value)}`
      });
      continue;
    }

    if (spec.enum && !spec.enum.some((allowed) => allowed === value)) {
      const allowed = spec.enum.map((entry) => JSON.stringify(entry)).join(", ");
      problems.push({field: name, reason: "enum", message: `parameter "${name}" must be one of ${allowed}`});
    }
  }

  if (!schema.allowsAdditional) {
    for (const name of Object.keys(input)) {
      if (!Object.hasOwn(schema.fields, name)) {
        problems.push({field: name, reason: "unrecognized", message: `unrecognized parameter "${name}"`});
      }
    }
  }

  return problems;
}

export function matchesKind(value: unknown, kind: FieldKind): boolean {
  switch (kind) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "object":
      return isJsonObject(value);
    case "array":
      return Array.isArray(value);
    case "null":
      return value === null;
  }
}

function kindOf(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  return typeof value;
}

/** `well_id: string, depth?: number` */
export function formatSignature(schema: InputSchema): string {
  return Object.entries(schema.fields)
    .map(([name, spec]) => `${name}${spec.required ? "" : "?"}: ${spec.kinds.length > 0 ? spec.kinds.join(" | ") : "any"}`)
    .join(", ");
}
