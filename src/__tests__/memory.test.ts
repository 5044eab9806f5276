import {describe, expect, it} from "vitest";

import {ConversationMemory} from "../chat/memory.js";

function turn(query: string) {
  return {query, action: `list tools`, result: `result for ${query}`};
}

describe("ConversationMemory", () => {
  it("keeps at most `limit` turns, evicting the oldest", () => {
    const memory = new ConversationMemory(2);

    memory.append(turn("one"));
    memory.append(turn("two"));
    memory.append(turn("three"));

    expect(memory.size).toBe(2);
    expect(memory.all().map((entry) => entry.query)).toEqual(["two", "three"]);
  });

  it("numbers turns monotonically across evictions", () => {
    const memory = new ConversationMemory(1);

    memory.append(turn("one"));
    const second = memory.append(turn("two"));

    expect(second.index).toBe(1);
    expect(Object.isFrozen(second)).toBe(true);
  });

  it("returns the last k turns in order", () => {
    const memory = new ConversationMemory(5);
    ["a", "b", "c"].forEach((query) => memory.append(turn(query)));

    expect(memory.recent(2).map((entry) => entry.query)).toEqual(["b", "c"]);
    expect(memory.recent(10).map((entry) => entry.query)).toEqual(["a", "b", "c"]);
    expect(memory.recent(0)).toEqual([]);
  });

  it("does not expose its internal list", () => {
    const memory = new ConversationMemory(3);
    memory.append(turn("a"));

    const snapshot = memory.all();
    memory.append(turn("b"));

    expect(snapshot).toHaveLength(1);
  });

  it("rejects a non-positive limit", () => {
    expect(() => new ConversationMemory(0)).toThrow(RangeError);
    expect(() => new ConversationMemory(1.5)).toThrow("memory limit must be a positive integer, got 1.5");
  });

  it("can be cleared", () => {
    const memory = new ConversationMemory(3);
    memory.append(turn("a"));

    memory.clear();

    expect(memory.size).toBe(0);
  });
});
