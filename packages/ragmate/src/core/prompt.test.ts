import { describe, expect, it } from "vitest";

import { createMessage } from "./messages.js";
import { parseGenerationMode, selectMode } from "./modes.js";
import { PromptBuilder, toQueryText } from "./prompt.js";

describe("PromptBuilder", () => {
  it("serializes entries in insertion order", () => {
    const prompt = new PromptBuilder()
      .addSystem("S")
      .addMemory([createMessage("alice", "Hi"), createMessage("Bot", "Hello", "assistant")])
      .addContext("retrieved passage")
      .addQuery("Q")
      .serialize();

    expect(prompt).toBe("System: S\nalice: Hi\nBot: Hello\nContext: retrieved passage\nUser: Q");
  });

  it("skips empty context and empty queries", () => {
    const prompt = new PromptBuilder().addSystem("S").addContext("").addContext(undefined).addQuery("").serialize();

    expect(prompt).toBe("System: S");
  });

  it("returns copies from build()", () => {
    const builder = new PromptBuilder().addSystem("S");
    const entries = builder.build();
    entries[0] = { speaker: "Hacked", text: "!" };

    expect(builder.build()).toEqual([{ speaker: "System", text: "S" }]);
  });
});

describe("toQueryText", () => {
  it("joins contents with newlines", () => {
    expect(toQueryText([createMessage("a", "one"), createMessage("b", "two")])).toBe("one\ntwo");
    expect(toQueryText([])).toBe("");
  });
});

describe("selectMode", () => {
  it("maps the retrieval flag", () => {
    expect(selectMode(true)).toBe("chat");
    expect(selectMode(false)).toBe("query");
  });
});

describe("parseGenerationMode", () => {
  it("accepts known modes case-insensitively", () => {
    expect(parseGenerationMode(" Chat ")).toBe("chat");
    expect(parseGenerationMode("QUERY")).toBe("query");
  });

  it("rejects anything else", () => {
    expect(() => parseGenerationMode("search")).toThrow(
      'Unknown generation mode "search". Expected one of: chat, query.',
    );
  });
});
