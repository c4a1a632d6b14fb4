import {
  DEFAULT_API_URL,
  DEFAULT_DIRECT_MODEL,
  DEFAULT_WORKSPACE_SLUG,
  ENV_API_KEY,
  ENV_API_URL,
  ENV_MODEL,
  ENV_OPENAI_API_KEY,
  ENV_OPENAI_BASE_URL,
  ENV_WORKSPACE_SLUG,
} from "../core/constants.js";
import { ConfigurationMissingError } from "../core/errors.js";
import { type Environment, resolveSetting } from "./env.js";

export interface WorkspaceConfigOptions {
  apiUrl?: string;
  apiKey?: string;
  workspaceSlug?: string;
}

export interface WorkspaceConfig {
  apiUrl: string;
  apiKey: string;
  workspaceSlug: string;
}

export interface DirectConfigOptions {
  apiKey?: string;
  model?: string;
  baseURL?: string;
}

export interface DirectConfig {
  apiKey: string;
  model: string;
  baseURL?: string;
}

/**
 * Resolves workspace connection settings.
 *
 * Priority (highest to lowest):
 * 1. Explicit option
 * 2. RAGMATE_API_URL / RAGMATE_API_KEY / RAGMATE_WORKSPACE_SLUG
 * 3. Built-in default (none for the API key)
 *
 * @throws ConfigurationMissingError when no API key can be found
 */
export function resolveWorkspaceConfig(
  options: WorkspaceConfigOptions = {},
  env: Environment = process.env,
): WorkspaceConfig {
  const apiKey = resolveSetting(options.apiKey, ENV_API_KEY, env);
  if (!apiKey) {
    throw new ConfigurationMissingError("Workspace API key", ENV_API_KEY);
  }

  return {
    apiUrl: resolveSetting(options.apiUrl, ENV_API_URL, env, DEFAULT_API_URL).replace(/\/+$/, ""),
    apiKey,
    workspaceSlug: resolveSetting(options.workspaceSlug, ENV_WORKSPACE_SLUG, env, DEFAULT_WORKSPACE_SLUG),
  };
}

/**
 * Resolves settings for the direct (no retrieval) backend.
 *
 * @throws ConfigurationMissingError when no OpenAI API key can be found
 */
export function resolveDirectConfig(
  options: DirectConfigOptions = {},
  env: Environment = process.env,
): DirectConfig {
  const apiKey = resolveSetting(options.apiKey, ENV_OPENAI_API_KEY, env);
  if (!apiKey) {
    throw new ConfigurationMissingError("OpenAI API key", ENV_OPENAI_API_KEY);
  }

  return {
    apiKey,
    model: resolveSetting(options.model, ENV_MODEL, env, DEFAULT_DIRECT_MODEL),
    baseURL: resolveSetting(options.baseURL, ENV_OPENAI_BASE_URL, env),
  };
}
