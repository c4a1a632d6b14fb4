import { describe, expect, it } from "vitest";

import { createMessage } from "../core/messages.js";
import { BufferedMemoryWindow, estimateMessageTokens } from "./buffered-window.js";

const m = (n: number) => createMessage("alice", `message ${n}`);

describe("BufferedMemoryWindow", () => {
  it("returns the newest n entries, oldest first", () => {
    const memory = new BufferedMemoryWindow();
    memory.append(m(1), m(2), m(3));

    expect(memory.recent(2)).toEqual([m(2), m(3)]);
    expect(memory.recent(10)).toEqual([m(1), m(2), m(3)]);
  });

  it("returns nothing for zero, negative or NaN counts", () => {
    const memory = new BufferedMemoryWindow();
    memory.append(m(1), m(2));

    expect(memory.recent(0)).toEqual([]);
    expect(memory.recent(-1)).toEqual([]);
    expect(memory.recent(Number.NaN)).toEqual([]);
    expect(memory.recent(0.5)).toEqual([]);
  });

  it("does not change on read", () => {
    const memory = new BufferedMemoryWindow();
    memory.append(m(1), m(2));

    const first = memory.recent(2);
    first.pop();

    expect(memory.recent(2)).toEqual([m(1), m(2)]);
    expect(memory.size).toBe(2);
  });

  it("evicts the oldest entries beyond maxEntries", () => {
    const memory = new BufferedMemoryWindow({ kind: "entries", maxEntries: 2 });
    memory.append(m(1), m(2), m(3));

    expect(memory.size).toBe(2);
    expect(memory.recent(5)).toEqual([m(2), m(3)]);
  });

  it("evicts by estimated tokens but keeps the newest message", () => {
    // "alice" + "message N" + 2 = 16 chars = 4 tokens each
    expect(estimateMessageTokens(m(1))).toBe(4);

    const memory = new BufferedMemoryWindow({ kind: "tokens", maxTokens: 8 });
    memory.append(m(1), m(2), m(3));
    expect(memory.recent(5)).toEqual([m(2), m(3)]);

    const tiny = new BufferedMemoryWindow({ kind: "tokens", maxTokens: 1 });
    tiny.append(m(1), m(2));
    expect(tiny.recent(5)).toEqual([m(2)]);
  });

  it("rejects invalid policies", () => {
    expect(() => new BufferedMemoryWindow({ kind: "entries", maxEntries: 0 })).toThrow(RangeError);
    expect(() => new BufferedMemoryWindow({ kind: "entries", maxEntries: 1.5 })).toThrow(RangeError);
    expect(() => new BufferedMemoryWindow({ kind: "tokens", maxTokens: 0 })).toThrow(RangeError);
  });
});
