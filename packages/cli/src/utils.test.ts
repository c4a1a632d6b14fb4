import { Writable } from "node:stream";
import { InvalidArgumentError } from "commander";
import { ConfigurationMissingError, createLogger, stripAnsi } from "ragmate";
import { describe, expect, it } from "vitest";
import type { CLIEnvironment } from "./environment.js";
import { createNumericParser, executeAction } from "./utils.js";

function createWritable() {
  let data = "";
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      data += chunk.toString();
      callback();
    },
  });
  return { stream, read: () => stripAnsi(data) };
}

function createEnv(stderr: Writable, onExit: (code: number) => void): CLIEnvironment {
  return {
    argv: ["node", "ragmate"],
    stdin: process.stdin,
    stdout: new Writable({ write: (_chunk, _encoding, callback) => callback() }),
    stderr,
    vars: {},
    configPath: "/nonexistent/cli.toml",
    createWorkspaceClient: () => {
      throw new Error("Client not provided");
    },
    createBackend: () => {
      throw new Error("Backend not provided");
    },
    setExitCode: onExit,
    createLogger: (name: string) => createLogger({ type: "hidden", name }),
  };
}

describe("createNumericParser", () => {
  const parse = createNumericParser({ label: "Limit", integer: true, min: 1, max: 50 });

  it("returns valid numbers", () => {
    expect(parse("5")).toBe(5);
  });

  it("rejects invalid values", () => {
    expect(() => parse("many")).toThrow(new InvalidArgumentError("Limit must be a number."));
    expect(() => parse("1.5")).toThrow("Limit must be an integer.");
    expect(() => parse("0")).toThrow("Limit must be greater than or equal to 1.");
    expect(() => parse("51")).toThrow("Limit must be less than or equal to 50.");
  });
});

describe("executeAction", () => {
  it("does nothing extra when the action succeeds", async () => {
    const stderr = createWritable();
    const codes: number[] = [];

    await executeAction(async () => {}, createEnv(stderr.stream, (code) => codes.push(code)));

    expect(stderr.read()).toBe("");
    expect(codes).toEqual([]);
  });

  it("prints the error and sets exit code 1", async () => {
    const stderr = createWritable();
    const codes: number[] = [];

    await executeAction(
      async () => {
        throw new Error("boom");
      },
      createEnv(stderr.stream, (code) => codes.push(code)),
    );

    expect(stderr.read()).toBe("Error: boom\n");
    expect(codes).toEqual([1]);
  });

  it("lists the variables to set when configuration is missing", async () => {
    const stderr = createWritable();

    await executeAction(
      async () => {
        throw new ConfigurationMissingError("Workspace API key", "RAGMATE_API_KEY");
      },
      createEnv(stderr.stream, () => {}),
    );

    expect(stderr.read()).toBe(
      [
        "Error: Workspace API key is required. Pass it explicitly or set RAGMATE_API_KEY.",
        "Please set the following in your environment or .env file:",
        "  RAGMATE_API_KEY=<your workspace API key>",
        "  RAGMATE_API_URL=http://localhost:3001/api",
        "  RAGMATE_WORKSPACE_SLUG=scientific-papers",
        "",
      ].join("\n"),
    );
  });
});
