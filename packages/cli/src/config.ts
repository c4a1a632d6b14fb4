import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { load as parseToml } from "js-toml";
import { type CLILogLevel, LOG_LEVELS } from "./constants.js";
import { expandTildePath } from "./paths.js";

/**
 * Global options that apply to every command.
 */
export interface GlobalConfig {
  "log-level"?: CLILogLevel;
}

/**
 * Connection defaults for the workspace service. The API key is never read from
 * this file; it comes from the environment (or `.env`).
 */
export interface WorkspaceSectionConfig {
  "api-url"?: string;
  "workspace-slug"?: string;
  "workspace-name"?: string;
}

/**
 * Defaults for the `ask` and `chat` commands.
 */
export interface AgentSectionConfig {
  name?: string;
  system?: string;
  "memory-window"?: number;
  model?: string;
}

/**
 * Defaults for the `upload` and `setup` commands.
 */
export interface UploadSectionConfig {
  extensions?: string[];
  directories?: string[];
}

/**
 * Root configuration structure matching ~/.ragmate/cli.toml.
 */
export interface CLIConfig {
  global?: GlobalConfig;
  workspace?: WorkspaceSectionConfig;
  agent?: AgentSectionConfig;
  upload?: UploadSectionConfig;
}

type Table = Record<string, unknown>;

const GLOBAL_CONFIG_KEYS = new Set(["log-level"]);
const WORKSPACE_CONFIG_KEYS = new Set(["api-url", "workspace-slug", "workspace-name"]);
const AGENT_CONFIG_KEYS = new Set(["name", "system", "memory-window", "model"]);
const UPLOAD_CONFIG_KEYS = new Set(["extensions", "directories"]);

/**
 * Returns the default config file path: ~/.ragmate/cli.toml
 */
export function getConfigPath(): string {
  return join(homedir(), ".ragmate", "cli.toml");
}

/**
 * Configuration validation error.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

function isTable(value: unknown): value is Table {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLogLevel(value: string): value is CLILogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function validateString(value: unknown, key: string, section: string): string {
  if (typeof value !== "string") {
    throw new ConfigError(`[${section}].${key} must be a string`);
  }
  return value;
}

/**
 * Validates that a value is a string representing a file path.
 * Expands tilde (~) to the user's home directory.
 */
function validatePathString(value: unknown, key: string, section: string): string {
  return expandTildePath(validateString(value, key, section));
}

function validateNumber(
  value: unknown,
  key: string,
  section: string,
  opts?: { min?: number; max?: number; integer?: boolean },
): number {
  if (typeof value !== "number") {
    throw new ConfigError(`[${section}].${key} must be a number`);
  }
  if (opts?.integer && !Number.isInteger(value)) {
    throw new ConfigError(`[${section}].${key} must be an integer`);
  }
  if (opts?.min !== undefined && value < opts.min) {
    throw new ConfigError(`[${section}].${key} must be >= ${opts.min}`);
  }
  if (opts?.max !== undefined && value > opts.max) {
    throw new ConfigError(`[${section}].${key} must be <= ${opts.max}`);
  }
  return value;
}

function validateStringArray(value: unknown, key: string, section: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`[${section}].${key} must be an array`);
  }
  const result: string[] = [];
  for (let i = 0; i < value.length; i++) {
    const item: unknown = value[i];
    if (typeof item !== "string") {
      throw new ConfigError(`[${section}].${key}[${i}] must be a string`);
    }
    result.push(item);
  }
  return result;
}

/**
 * Ensures a section is a table and contains only known keys.
 */
function validateSection(raw: unknown, section: string, allowed: Set<string>): Table {
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }
  for (const key of Object.keys(raw)) {
    if (!allowed.has(key)) {
      throw new ConfigError(`[${section}].${key} is not a valid option`);
    }
  }
  return raw;
}

function validateGlobalConfig(raw: unknown, section: string): GlobalConfig {
  const table = validateSection(raw, section, GLOBAL_CONFIG_KEYS);
  const result: GlobalConfig = {};

  if ("log-level" in table) {
    const level = validateString(table["log-level"], "log-level", section);
    if (!isLogLevel(level)) {
      throw new ConfigError(`[${section}].log-level must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    result["log-level"] = level;
  }

  return result;
}

function validateWorkspaceConfig(raw: unknown, section: string): WorkspaceSectionConfig {
  const table = validateSection(raw, section, WORKSPACE_CONFIG_KEYS);
  const result: WorkspaceSectionConfig = {};

  if ("api-url" in table) {
    result["api-url"] = validateString(table["api-url"], "api-url", section);
  }
  if ("workspace-slug" in table) {
    result["workspace-slug"] = validateString(table["workspace-slug"], "workspace-slug", section);
  }
  if ("workspace-name" in table) {
    result["workspace-name"] = validateString(table["workspace-name"], "workspace-name", section);
  }

  return result;
}

function validateAgentConfig(raw: unknown, section: string): AgentSectionConfig {
  const table = validateSection(raw, section, AGENT_CONFIG_KEYS);
  const result: AgentSectionConfig = {};

  if ("name" in table) {
    result.name = validateString(table.name, "name", section);
  }
  if ("system" in table) {
    result.system = validateString(table.system, "system", section);
  }
  if ("memory-window" in table) {
    result["memory-window"] = validateNumber(table["memory-window"], "memory-window", section, {
      integer: true,
      min: 0,
    });
  }
  if ("model" in table) {
    result.model = validateString(table.model, "model", section);
  }

  return result;
}

function validateUploadConfig(raw: unknown, section: string): UploadSectionConfig {
  const table = validateSection(raw, section, UPLOAD_CONFIG_KEYS);
  const result: UploadSectionConfig = {};

  if ("extensions" in table) {
    result.extensions = validateStringArray(table.extensions, "extensions", section);
  }
  if ("directories" in table) {
    result.directories = validateStringArray(table.directories, "directories", section).map((dir, i) =>
      validatePathString(dir, `directories[${i}]`, section),
    );
  }

  return result;
}

/**
 * Validates and normalizes raw TOML object to CLIConfig.
 *
 * @throws ConfigError if validation fails
 */
export function validateConfig(raw: unknown, configPath?: string): CLIConfig {
  if (!isTable(raw)) {
    throw new ConfigError("Config must be a TOML table", configPath);
  }

  const result: CLIConfig = {};

  for (const [key, value] of Object.entries(raw)) {
    try {
      if (key === "global") {
        result.global = validateGlobalConfig(value, key);
      } else if (key === "workspace") {
        result.workspace = validateWorkspaceConfig(value, key);
      } else if (key === "agent") {
        result.agent = validateAgentConfig(value, key);
      } else if (key === "upload") {
        result.upload = validateUploadConfig(value, key);
      } else {
        throw new ConfigError(`[${key}] is not a valid section`);
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(error.message, configPath);
      }
      throw error;
    }
  }

  return result;
}

/**
 * Loads configuration from ~/.ragmate/cli.toml (or the given path).
 * Returns empty config if file doesn't exist.
 *
 * @throws ConfigError if file exists but has invalid syntax or unknown fields
 */
export function loadConfig(configPath: string = getConfigPath()): CLIConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return validateConfig(raw, configPath);
}
