import { Writable } from "node:stream";
import { createLogger, stripAnsi } from "ragmate";
import { describe, expect, it } from "vitest";
import { MockBackend } from "../../testing/src/index.js";
import { createCLIAgent, SourceRecorder, sourceTitles, writeSources } from "./agent-factory.js";
import type { CLIEnvironment } from "./environment.js";
import { createLoggerFactory } from "./environment.js";
import { formatSnippet } from "./search-command.js";

function createEnv(backend: MockBackend): CLIEnvironment {
  return {
    argv: ["node", "ragmate"],
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    vars: {},
    configPath: "/nonexistent/cli.toml",
    createWorkspaceClient: () => {
      throw new Error("Client not provided");
    },
    createBackend: () => backend,
    setExitCode: () => {},
    createLogger: (name: string) => createLogger({ type: "hidden", name }),
  };
}

describe("SourceRecorder", () => {
  it("keeps the sources of the latest answer only", async () => {
    const inner = new MockBackend({ replies: ["a", "b"], sources: [{ title: "p.txt" }] });
    const recorder = new SourceRecorder(inner);

    await recorder.generate({ prompt: "x", mode: "chat" });
    expect(recorder.lastSources).toEqual([{ title: "p.txt" }]);
    expect(recorder.kind).toBe("workspace");
  });

  it("clears sources when generation fails", async () => {
    const recorder = new SourceRecorder(
      new MockBackend({ replies: ["a"], sources: [{ title: "p.txt" }] }).failWith(new Error("down")),
    );

    await recorder.generate({ prompt: "x", mode: "chat" });
    await expect(recorder.generate({ prompt: "y", mode: "chat" })).rejects.toThrow("down");
    expect(recorder.lastSources).toEqual([]);
  });
});

describe("sourceTitles", () => {
  it("drops untitled and repeated sources", () => {
    expect(sourceTitles([{ title: "a.txt" }, { text: "no title" }, { title: "b.txt" }, { title: "a.txt" }])).toEqual([
      "a.txt",
      "b.txt",
    ]);
  });
});

describe("writeSources", () => {
  it("writes nothing without titles", () => {
    let data = "";
    const stream = new Writable({
      write(chunk, _encoding, callback) {
        data += chunk.toString();
        callback();
      },
    });

    writeSources(stream, [{ text: "untitled" }]);
    expect(data).toBe("");

    writeSources(stream, [{ title: "a.txt" }]);
    expect(stripAnsi(data)).toBe("\nSources:\n  - a.txt\n");
  });
});

describe("createCLIAgent", () => {
  it("prefers command options over the config file", () => {
    const { agent } = createCLIAgent(
      { rag: true, memory: true, name: "Curie", memoryWindow: 0 },
      createEnv(new MockBackend()),
      { agent: { name: "Config Name", system: "From config." } },
    );

    expect(agent.state).toMatchObject({ name: "Curie", systemPrompt: "From config.", memoryEnabled: true });
  });

  it("disables memory when asked", () => {
    const { agent } = createCLIAgent({ rag: true, memory: false }, createEnv(new MockBackend()));

    expect(agent.state.memoryEnabled).toBe(false);
  });

  it("applies the configured memory window", async () => {
    const backend = new MockBackend({ replies: ["A1", "A2"] });
    const { agent } = createCLIAgent({ rag: true, memory: true }, createEnv(backend), {
      agent: { "memory-window": 1 },
    });

    await agent.respond();
    await agent.respond();

    expect(backend.prompts[1]).toBe("System: You are a helpful research assistant.\nAssistant: A1");
  });
});

describe("createLoggerFactory", () => {
  it("applies --log-level to named loggers", () => {
    const logger = createLoggerFactory({ logLevel: "debug" })("setup");

    expect(logger.settings.minLevel).toBe(2);
    expect(logger.settings.name).toBe("setup");
  });
});

describe("formatSnippet", () => {
  it("flattens whitespace and truncates long text", () => {
    expect(formatSnippet("  one\n two  ")).toBe("one two");
    expect(formatSnippet("x".repeat(130))).toBe(`${"x".repeat(120)}...`);
    expect(formatSnippet("   ")).toBeUndefined();
    expect(formatSnippet(undefined)).toBeUndefined();
  });
});
