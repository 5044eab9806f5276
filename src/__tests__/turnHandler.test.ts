/**
 * Integration Tests: one turn end to end (src/agent/turnHandler.ts)
 *
 * A scripted classifier and an in-process capability server stand in for
 * the LLM and the MCP server; everything between them is the real code.
 */

import {beforeEach, describe, expect, it} from "vitest";

import {ClassifierGateway} from "../agent/classifier.js";
import {Dispatcher} from "../agent/dispatcher.js";
import {ResultFormatter} from "../agent/formatter.js";
import {TurnHandler} from "../agent/turnHandler.js";
import type {TurnState} from "../agent/types.js";
import {ConversationMemory} from "../chat/memory.js";
import {discoverCatalog} from "../runtime/catalog.js";
import {silentLogger} from "../utils/logger.js";
import type {Classifier} from "../agent/classifier.js";
import {
  ADD_NUMBERS,
  FakeCapabilityServer,
  GET_CASINGS,
  ScriptedClassifier,
  WELLS_RESOURCE,
  textResult
} from "./helpers/fakeServer.js";

const logger = silentLogger;

interface Harness {
  server: FakeCapabilityServer;
  classifier: ScriptedClassifier;
  memory: ConversationMemory;
  turns: TurnHandler;
  states: TurnState[];
  callsSinceDiscovery: () => string[];
}

async function createHarness(replies: string[], memorySize = 5, formatter?: ResultFormatter): Promise<Harness> {
  const server = new FakeCapabilityServer({tools: [ADD_NUMBERS, GET_CASINGS], resources: [WELLS_RESOURCE]});
  const discover = (signal?: AbortSignal) => discoverCatalog(server, {signal, logger});
  const catalog = await discover();
  const discoveryCalls = server.calls.length;
  const classifier = new ScriptedClassifier(replies);
  const memory = new ConversationMemory(memorySize);
  const states: TurnState[] = [];
  const turns = new TurnHandler({
    gateway: new ClassifierGateway({classifier, logger}),
    dispatcher: new Dispatcher({server, logger}),
    memory,
    catalog,
    formatter,
    discover,
    onStateChange: (state) => states.push(state),
    logger
  });
  return {
    server,
    classifier,
    memory,
    turns,
    states,
    callsSinceDiscovery: () => server.methods().slice(discoveryCalls)
  };
}

describe("TurnHandler", () => {
  describe("end-to-end scenarios", () => {
    let harness: Harness;

    beforeEach(async () => {
      harness = await createHarness([
        '{"action": "list", "type": "tools"}',
        '{"action": "tool", "tool_name": "get_casings_for_well", "tool_input": {"well_id": "well1"}}',
        '{"action": "resource", "resource_uri": "osdu:wells"}',
        '{"action": "error", "message": "no matching capability"}',
        '{"action": "list", "type": "resources"}'
      ]);
    });

    it("lists tools from the catalog", async () => {
      const result = await harness.turns.handle("list tools");

      expect(result.status).toBe("ok");
      expect(result.payload.outcome).toEqual({kind: "list_result", category: "tools", entries: harness.turns.catalog.tools});
      expect(result.payload.text).toBe(
        [
          "Tools:",
          "- add_numbers(a: number, b: number): Add two numbers",
          "- get_casings_for_well(well_id: string): List casings installed in a well"
        ].join("\n")
      );
      expect(harness.states).toEqual(["Received", "Classifying", "Validating", "Dispatching", "Succeeded"]);
      expect(harness.callsSinceDiscovery()).toEqual([]);
    });

    it("calls a tool with the classifier's arguments", async () => {
      await harness.turns.handle("list tools");

      const result = await harness.turns.handle("get casings for well1");

      expect(result.status).toBe("ok");
      expect(result.payload.text).toBe("casings for well1: surface, intermediate");
      expect(harness.server.calls.at(-1)).toEqual({
        method: "tools/call",
        params: {name: "get_casings_for_well", arguments: {well_id: "well1"}}
      });
    });

    it("reads a resource", async () => {
      await harness.turns.handle("list tools");
      await harness.turns.handle("get casings for well1");

      const result = await harness.turns.handle("list osdu:wells");

      expect(result.payload.outcome).toMatchObject({kind: "resource_content", uri: "osdu:wells"});
      expect(result.payload.text).toBe("W-1, W-2");
    });

    it("reports a classification failure and stays usable", async () => {
      await harness.turns.handle("list tools");
      await harness.turns.handle("get casings for well1");
      await harness.turns.handle("list osdu:wells");

      const failed = await harness.turns.handle("what's the weather");
      const next = await harness.turns.handle("list resources");

      expect(failed.status).toBe("error");
      expect(failed.payload.state).toBe("ClassificationFailed");
      expect(failed.payload.text).toBe(
        "ClassificationFailed: Could not map the query to an available capability: no matching capability."
      );
      expect(next.status).toBe("ok");
      expect(harness.memory.all().map((turn) => turn.query)).toEqual([
        "list tools",
        "get casings for well1",
        "list osdu:wells",
        "list resources"
      ]);
    });
  });

  it("records the exchange in memory", async () => {
    const harness = await createHarness(['{"action": "list", "type": "tools"}']);

    await harness.turns.handle("  list tools  ");

    expect(harness.memory.all()).toEqual([
      {
        index: 0,
        query: "list tools",
        action: "list tools",
        result:
          "Tools: - add_numbers(a: number, b: number): Add two numbers - get_casings_for_well(well_id: string): List casings installed in a well"
      }
    ]);
  });

  it("records failed turns without calling the server", async () => {
    const harness = await createHarness(['{"action": "tool", "tool_name": "forecast", "tool_input": {"city": "Paris"}}']);

    const result = await harness.turns.handle("weather in Paris");

    expect(result.status).toBe("error");
    expect(result.payload.state).toBe("Failed");
    expect(result.payload.text).toBe('UnknownCapability: Unknown tool "forecast".');
    expect(harness.memory.all().map((turn) => turn.action)).toEqual(['tool forecast {"city":"Paris"}']);
    expect(harness.callsSinceDiscovery()).toEqual([]);
  });

  it("rejects schema violations before dispatch", async () => {
    const harness = await createHarness(['{"action": "tool", "tool_name": "add_numbers", "tool_input": {"a": "two", "b": 3}}']);

    const result = await harness.turns.handle("add two and 3");

    expect(result.payload.text).toBe(
      'SchemaViolation: Invalid input for tool "add_numbers": parameter "a" must be number, got string.'
    );
    expect(harness.states).toEqual(["Received", "Classifying", "Validating", "Failed"]);
    expect(harness.callsSinceDiscovery()).toEqual([]);
  });

  it("keeps only the configured number of turns", async () => {
    const harness = await createHarness(
      ['{"action": "list", "type": "tools"}', '{"action": "list", "type": "resources"}', '{"action": "list", "type": "prompts"}'],
      2
    );

    await harness.turns.handle("list tools");
    await harness.turns.handle("list resources");
    await harness.turns.handle("list prompts");

    expect(harness.memory.recent(2).map((turn) => turn.query)).toEqual(["list resources", "list prompts"]);
  });

  it("runs turns one at a time so each sees the previous one", async () => {
    const harness = await createHarness(['{"action": "list", "type": "tools"}', '{"action": "list", "type": "resources"}']);

    await Promise.all([harness.turns.handle("list tools"), harness.turns.handle("list resources")]);

    expect(harness.classifier.prompts[0]).toContain("Previous conversation:\nNone.");
    expect(harness.classifier.prompts[1]).toContain("User: list tools\nAction: list tools");
  });

  it("returns a cancelled result without recording it", async () => {
    const harness = await createHarness(['{"action": "list", "type": "tools"}']);
    const controller = new AbortController();
    controller.abort();

    const result = await harness.turns.handle("list tools", {signal: controller.signal});

    expect(result).toEqual({status: "error", payload: {text: "Turn cancelled.", state: "Received", cancelled: true}});
    expect(harness.memory.size).toBe(0);
    expect(harness.classifier.prompts).toEqual([]);
  });

  it("leaves memory and the catalog alone when the classifier reply has no JSON", async () => {
    const harness = await createHarness(["sorry, no idea"]);
    const catalogBefore = harness.turns.catalog;

    const result = await harness.turns.handle("frobnicate widgets");

    expect(result.status).toBe("error");
    expect(result.payload.state).toBe("ClassificationFailed");
    expect(result.payload.text).toBe(
      "ClassificationFailed: Could not map the query to an available capability: unparseable classifier output."
    );
    expect(harness.memory.size).toBe(0);
    expect(harness.turns.catalog).toBe(catalogBefore);
    expect(harness.callsSinceDiscovery()).toEqual([]);
  });

  it("cancels a turn whose tool call finishes after the abort", async () => {
    const harness = await createHarness(['{"action": "tool", "tool_name": "slow_lookup", "tool_input": {}}']);
    const controller = new AbortController();
    harness.server.tools = [
      ...harness.server.tools,
      {
        name: "slow_lookup",
        description: "Answers even after the caller gave up",
        handler: () => {
          controller.abort();
          return textResult("late answer");
        }
      }
    ];
    await harness.turns.refreshCatalog();

    const result = await harness.turns.handle("run the slow lookup", {signal: controller.signal});

    expect(result).toEqual({
      status: "error",
      payload: {
        text: "Turn cancelled.",
        state: "Dispatching",
        cancelled: true,
        action: {kind: "tool_call", toolName: "slow_lookup", toolInput: {}}
      }
    });
    expect(harness.server.methods().at(-1)).toBe("tools/call");
    expect(harness.memory.size).toBe(0);
  });

  it("abandons classification on abort and frees the queue for the next turn", async () => {
    const server = new FakeCapabilityServer({tools: [ADD_NUMBERS]});
    const catalog = await discoverCatalog(server, {logger});
    let calls = 0;
    const classifier: Classifier = {
      complete: () => {
        calls += 1;
        // the first call ignores its signal and never answers
        return calls === 1 ? new Promise<string>(() => undefined) : Promise.resolve('{"action": "list", "type": "tools"}');
      }
    };
    const memory = new ConversationMemory(5);
    const turns = new TurnHandler({
      gateway: new ClassifierGateway({classifier, timeoutMs: 60_000, logger}),
      dispatcher: new Dispatcher({server, logger}),
      memory,
      catalog,
      logger
    });
    const controller = new AbortController();

    const abandoned = turns.handle("list tools", {signal: controller.signal});
    const next = turns.handle("list tools");
    setTimeout(() => controller.abort(), 5);

    await expect(abandoned).resolves.toEqual({
      status: "error",
      payload: {text: "Turn cancelled.", state: "Classifying", cancelled: true}
    });
    await expect(next).resolves.toMatchObject({status: "ok", payload: {state: "Succeeded"}});
    expect(memory.all().map((turn) => turn.query)).toEqual(["list tools"]);
  });

  it("shows the rewritten result and remembers the local text", async () => {
    const formatter = new ResultFormatter({
      classifier: new ScriptedClassifier(["Well1 has surface and intermediate casings."]),
      instructions: "Summarise the output.",
      logger
    });
    const harness = await createHarness(
      ['{"action": "tool", "tool_name": "get_casings_for_well", "tool_input": {"well_id": "well1"}}'],
      5,
      formatter
    );

    const result = await harness.turns.handle("get casings for well1");

    expect(result.status).toBe("ok");
    expect(result.payload.text).toBe("Well1 has surface and intermediate casings.");
    expect(harness.memory.all().map((turn) => turn.result)).toEqual(["casings for well1: surface, intermediate"]);
  });

  it("swaps in a fresh catalog on refresh", async () => {
    const harness = await createHarness([]);
    harness.server.tools = [ADD_NUMBERS];

    const refreshed = await harness.turns.refreshCatalog();

    expect(refreshed.names("tools")).toEqual(["add_numbers"]);
    expect(harness.turns.catalog).toBe(refreshed);
  });
});
