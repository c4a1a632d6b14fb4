import { describe, expect, it } from "vitest";

import { ConfigurationMissingError } from "../core/errors.js";
import { readEnvVar, resolveSetting } from "./env.js";
import { resolveDirectConfig, resolveWorkspaceConfig } from "./resolve.js";

describe("readEnvVar", () => {
  it("trims values and treats blanks as unset", () => {
    expect(readEnvVar("A", { A: "  value " })).toBe("value");
    expect(readEnvVar("A", { A: "   " })).toBeUndefined();
    expect(readEnvVar("A", {})).toBeUndefined();
  });
});

describe("resolveSetting", () => {
  it("prefers explicit over environment over fallback", () => {
    expect(resolveSetting("explicit", "X", { X: "env" }, "fallback")).toBe("explicit");
    expect(resolveSetting(undefined, "X", { X: "env" }, "fallback")).toBe("env");
    expect(resolveSetting("", "X", {}, "fallback")).toBe("fallback");
    expect(resolveSetting(undefined, "X", {})).toBeUndefined();
  });
});

describe("resolveWorkspaceConfig", () => {
  it("falls back to defaults when only the key is set", () => {
    expect(resolveWorkspaceConfig({}, { RAGMATE_API_KEY: "test-secret" })).toEqual({
      apiUrl: "http://localhost:3001/api",
      apiKey: "test-secret",
      workspaceSlug: "scientific-papers",
    });
  });

  it("reads the environment and trims trailing slashes", () => {
    const config = resolveWorkspaceConfig(
      {},
      {
        RAGMATE_API_KEY: "test-secret",
        RAGMATE_API_URL: "http://rag.internal/api//",
        RAGMATE_WORKSPACE_SLUG: "lab",
      },
    );

    expect(config.apiUrl).toBe("http://rag.internal/api");
    expect(config.workspaceSlug).toBe("lab");
  });

  it("lets explicit options win", () => {
    const config = resolveWorkspaceConfig(
      { apiKey: "explicit-key", workspaceSlug: "mine" },
      { RAGMATE_API_KEY: "env-key", RAGMATE_WORKSPACE_SLUG: "lab" },
    );

    expect(config.apiKey).toBe("explicit-key");
    expect(config.workspaceSlug).toBe("mine");
  });

  it("fails fast without an API key", () => {
    expect(() => resolveWorkspaceConfig({}, {})).toThrow(ConfigurationMissingError);
    expect(() => resolveWorkspaceConfig({}, {})).toThrow(
      "Workspace API key is required. Pass it explicitly or set RAGMATE_API_KEY.",
    );
  });
});

describe("resolveDirectConfig", () => {
  it("uses the default model", () => {
    expect(resolveDirectConfig({}, { OPENAI_API_KEY: "test-secret" })).toEqual({
      apiKey: "test-secret",
      model: "gpt-4o-mini",
      baseURL: undefined,
    });
  });

  it("reads model and base URL from the environment", () => {
    const config = resolveDirectConfig(
      {},
      { OPENAI_API_KEY: "test-secret", RAGMATE_MODEL: "local-model", OPENAI_BASE_URL: "http://llm.test/v1" },
    );

    expect(config.model).toBe("local-model");
    expect(config.baseURL).toBe("http://llm.test/v1");
  });

  it("fails fast without an OpenAI key", () => {
    expect(() => resolveDirectConfig({}, {})).toThrow(
      "OpenAI API key is required. Pass it explicitly or set OPENAI_API_KEY.",
    );
  });
});
