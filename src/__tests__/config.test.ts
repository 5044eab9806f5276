import {mkdtempSync, rmSync, writeFileSync} from "node:fs";
import {tmpdir} from "node:os";
import path from "node:path";
import {afterEach, beforeEach, describe, expect, it} from "vitest";

import {loadConfig} from "../config.js";
import {ConfigError} from "../runtime/errors.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "mcp-agent-config-"));
  });

  afterEach(() => {
    rmSync(dir, {recursive: true, force: true});
  });

  function writeConfig(content: unknown): string {
    const file = path.join(dir, "config.json");
    writeFileSync(file, JSON.stringify(content));
    return file;
  }

  it("falls back to defaults", () => {
    const config = loadConfig({env: {}, configFile: false});

    expect(config).toEqual({
      serverUrl: "http://localhost:8000/mcp/",
      provider: "bedrock",
      model: "us.anthropic.claude-haiku-4-5-20251001-v1:0",
      memorySize: 5,
      historyWindow: 5,
      requestTimeoutMs: 30_000,
      classifierTimeoutMs: 60_000,
      classifierMaxTokens: 512,
      classifierTemperature: 0,
      transportRetries: 1,
      toolArgumentsKey: "arguments",
      debug: false
    });
  });

  it("reads the environment", () => {
    const config = loadConfig({
      env: {
        MCP_SERVER_URL: "http://mcp.internal:9000/mcp",
        MCP_MEMORY_SIZE: "3",
        MCP_AGENT_DEBUG: "true",
        ANTHROPIC_API_KEY: "test-secret"
      },
      configFile: false
    });

    expect(config.serverUrl).toBe("http://mcp.internal:9000/mcp/");
    expect(config.memorySize).toBe(3);
    expect(config.debug).toBe(true);
    expect(config.provider).toBe("anthropic");
    expect(config.model).toBe("claude-haiku-4-5-20251001");
  });

  it("lets config.json override the environment and the command line override both", () => {
    const configFile = writeConfig({
      default_mcp_server: "http://file-server/mcp/",
      memory_size: 4,
      history_window: 2,
      default_model: ""
    });

    const config = loadConfig({
      env: {MCP_MEMORY_SIZE: "3", MCP_HISTORY_WINDOW: "1", DEFAULT_MODEL: "env-model"},
      configFile,
      overrides: {memorySize: "7"}
    });

    expect(config.serverUrl).toBe("http://file-server/mcp/");
    expect(config.memorySize).toBe(7);
    expect(config.historyWindow).toBe(2);
    expect(config.model).toBe("env-model");
  });

  it("joins orchestrator prompts into the classifier instructions", () => {
    const configFile = writeConfig({orchestrator_prompts: ["Route requests.", "Prefer tools over resources."]});

    const config = loadConfig({env: {}, configFile});

    expect(config.instructions).toBe("Route requests.\nPrefer tools over resources.");
    expect(config.formatterInstructions).toBeUndefined();
  });

  it("enables the formatter pass only when formatter prompts are configured", () => {
    const configFile = writeConfig({formatter_prompts: ["Summarise the output.", "Keep it short."]});

    const config = loadConfig({env: {}, configFile});

    expect(config.formatterInstructions).toBe("Summarise the output.\nKeep it short.");
  });

  it("ignores a config file that does not exist", () => {
    const config = loadConfig({env: {}, configFile: path.join(dir, "missing.json")});

    expect(config.memorySize).toBe(5);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({env: {}, configFile: false, overrides: {memorySize: "zero"}})).toThrow(ConfigError);
    expect(() => loadConfig({env: {MCP_SERVER_URL: "not a url"}, configFile: false})).toThrow(/^Invalid configuration: /);
  });

  it("rejects a config file that is not JSON", () => {
    const file = path.join(dir, "config.json");
    writeFileSync(file, "{broken");

    expect(() => loadConfig({env: {}, configFile: file})).toThrow(`Failed to read ${file}: `);
  });
});
