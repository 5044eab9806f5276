/**
 * Unit Tests: capability catalog (src/runtime/catalog.ts)
 */

import {describe, expect, it} from "vitest";

import {Catalog, discoverCatalog} from "../runtime/catalog.js";
import {ProtocolError} from "../runtime/errors.js";
import type {CapabilityServer} from "../runtime/mcp.js";
import {silentLogger} from "../utils/logger.js";
import {ADD_NUMBERS, FakeCapabilityServer, GET_CASINGS, WELLS_RESOURCE} from "./helpers/fakeServer.js";

const logger = silentLogger;

describe("discoverCatalog", () => {
  it("lists tools, resources and prompts in that order", async () => {
    const server = new FakeCapabilityServer({
      tools: [ADD_NUMBERS, GET_CASINGS],
      resources: [WELLS_RESOURCE],
      prompts: [{name: "summarise_well", description: "Summarise a well", arguments: [{name: "well_id", required: true}]}]
    });

    const catalog = await discoverCatalog(server, {logger});

    expect(server.methods()).toEqual(["tools/list", "resources/list", "prompts/list"]);
    expect(catalog.names("tools")).toEqual(["add_numbers", "get_casings_for_well"]);
    expect(catalog.names("resources")).toEqual(["osdu:wells"]);
    expect(catalog.lookupResource("osdu:wells")).toEqual({
      kind: "resource",
      uri: "osdu:wells",
      name: "wells",
      description: "All wells in the field"
    });
    expect(catalog.lookupPrompt("summarise_well")).toEqual({
      kind: "prompt",
      name: "summarise_well",
      description: "Summarise a well",
      arguments: [{name: "well_id", required: true}]
    });
    expect(catalog.warnings).toEqual([]);
  });

  it("derives the input schema description for each tool", async () => {
    const catalog = await discoverCatalog(new FakeCapabilityServer({tools: [GET_CASINGS]}), {logger});

    expect(catalog.lookupTool("get_casings_for_well")?.schema).toEqual({
      fields: {well_id: {kinds: ["string"], required: true, description: "Well identifier"}},
      allowsAdditional: false
    });
  });

  it("keeps the other categories when one listing fails", async () => {
    const server = new FakeCapabilityServer({tools: [ADD_NUMBERS]});
    server.failNext("resources/list", new ProtocolError("ServerError", "Method not found", {code: -32601}));

    const catalog = await discoverCatalog(server, {logger});

    expect(catalog.names("tools")).toEqual(["add_numbers"]);
    expect(catalog.resources).toEqual([]);
    expect(catalog.warnings).toEqual([
      {category: "resources", message: "resources discovery failed: server error -32601: Method not found"}
    ]);
  });

  it("follows nextCursor across pages", async () => {
    const cursors: Array<string | undefined> = [];
    const server: CapabilityServer = {
      async listTools(cursor) {
        cursors.push(cursor);
        return cursor === undefined
          ? {tools: [{name: "first"}], nextCursor: "page-2"}
          : {tools: [{name: "second"}]};
      },
      listResources: async () => ({resources: []}),
      listPrompts: async () => ({prompts: []}),
      callTool: async () => ({}),
      readResource: async () => ({}),
      ping: async () => ({})
    };

    const catalog = await discoverCatalog(server, {logger});

    expect(cursors).toEqual([undefined, "page-2"]);
    expect(catalog.names("tools")).toEqual(["first", "second"]);
  });

  it("skips nameless and duplicate entries with a warning", async () => {
    const server = new FakeCapabilityServer();
    server.prompts = [{name: "brief"}, {description: "no name"}, {name: "brief", description: "again"}];

    const catalog = await discoverCatalog(server, {logger});

    expect(catalog.names("prompts")).toEqual(["brief"]);
    expect(catalog.warnings.map((warning) => warning.message)).toEqual([
      "skipped a prompt without a name",
      'duplicate prompts entry "brief" ignored'
    ]);
  });

  it("warns when a listing carries no array", async () => {
    const server = new FakeCapabilityServer();
    server.listResources = async () => ({items: []});

    const catalog = await discoverCatalog(server, {logger});

    expect(catalog.warnings).toEqual([{category: "resources", message: 'resources/list result has no "resources" array'}]);
  });
});

describe("Catalog", () => {
  it("is frozen", () => {
    const catalog = Catalog.empty();

    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.tools)).toBe(true);
    expect(catalog.isEmpty()).toBe(true);
  });

  it("compares contents without regard to order", async () => {
    const first = await discoverCatalog(new FakeCapabilityServer({tools: [ADD_NUMBERS, GET_CASINGS]}), {logger});
    const reordered = await discoverCatalog(new FakeCapabilityServer({tools: [GET_CASINGS, ADD_NUMBERS]}), {logger});
    const changed = await discoverCatalog(new FakeCapabilityServer({tools: [ADD_NUMBERS]}), {logger});

    expect(first.equals(reordered)).toBe(true);
    expect(first.equals(changed)).toBe(false);
  });

  it("gives equal catalogs when discovery runs twice against an unchanged server", async () => {
    const server = new FakeCapabilityServer({
      tools: [ADD_NUMBERS, GET_CASINGS],
      resources: [WELLS_RESOURCE],
      prompts: [{name: "summarise_well", description: "Summarise a well", arguments: [{name: "well_id", required: true}]}]
    });

    const first = await discoverCatalog(server, {logger});
    const second = await discoverCatalog(server, {logger});

    expect(second).not.toBe(first);
    expect(first.equals(second)).toBe(true);
    expect(second.names("prompts")).toEqual(["summarise_well"]);
  });
});
