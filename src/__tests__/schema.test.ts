/**
 * Unit Tests: tool input schemas (src/runtime/schema.ts)
 */

import {describe, expect, it} from "vitest";

import {describeInputSchema, formatSignature, OPEN_INPUT_SCHEMA, validateToolInput} from "../runtime/schema.js";

const wellSchema = describeInputSchema({
  type: "object",
  properties: {
    well_id: {type: "string"},
    depth: {type: ["number", "null"]},
    unit: {type: "string", enum: ["m", "ft"]}
  },
  required: ["well_id"]
});

describe("describeInputSchema", () => {
  it("records kinds, required flags and enums", () => {
    expect(wellSchema).toEqual({
      fields: {
        well_id: {kinds: ["string"], required: true},
        depth: {kinds: ["number", "null"], required: false},
        unit: {kinds: ["string"], required: false, enum: ["m", "ft"]}
      },
      allowsAdditional: false
    });
  });

  it("treats a missing or unreadable schema as open", () => {
    expect(describeInputSchema(undefined)).toBe(OPEN_INPUT_SCHEMA);
    expect(describeInputSchema("not a schema")).toBe(OPEN_INPUT_SCHEMA);
  });

  it("keeps required names that have no property", () => {
    expect(describeInputSchema({required: ["token"]}).fields).toEqual({token: {kinds: [], required: true}});
  });
});

describe("validateToolInput", () => {
  it("accepts matching input", () => {
    expect(validateToolInput({well_id: "W-1", depth: null, unit: "ft"}, wellSchema)).toEqual([]);
  });

  it("reports every problem without coercing", () => {
    const problems = validateToolInput({depth: "100", unit: "yards", color: "red"}, wellSchema);

    expect(problems.map((problem) => problem.message)).toEqual([
      'missing required parameter "well_id"',
      'parameter "depth" must be number or null, got string',
      'parameter "unit" must be one of "m", "ft"',
      'unrecognized parameter "color"'
    ]);
  });

  it("distinguishes integers from other numbers", () => {
    const schema = describeInputSchema({properties: {count: {type: "integer"}}});

    expect(validateToolInput({count: 3}, schema)).toEqual([]);
    expect(validateToolInput({count: 2.5}, schema)[0]?.reason).toBe("type");
  });

  it("reports keys named after built-in object members as unrecognized", () => {
    const problems = validateToolInput({well_id: "W-1", constructor: "x", toString: 1}, wellSchema);

    expect(problems).toEqual([
      {field: "constructor", reason: "unrecognized", message: 'unrecognized parameter "constructor"'},
      {field: "toString", reason: "unrecognized", message: 'unrecognized parameter "toString"'}
    ]);
  });

  it("does not treat inherited members as supplied values", () => {
    const schema = describeInputSchema({properties: {valueOf: {type: "string"}}, required: ["valueOf"]});

    expect(validateToolInput({}, schema)).toEqual([
      {field: "valueOf", reason: "missing", message: 'missing required parameter "valueOf"'}
    ]);
  });

  it("allows extra keys when additionalProperties is true", () => {
    const schema = describeInputSchema({properties: {}, additionalProperties: true});

    expect(validateToolInput({anything: 1}, schema)).toEqual([]);
  });
});

describe("formatSignature", () => {
  it("marks optional parameters", () => {
    expect(formatSignature(wellSchema)).toBe("well_id: string, depth?: number | null, unit?: string");
  });
});
