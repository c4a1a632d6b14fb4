import type { Environment } from "../config/env.js";
import { type DirectConfigOptions, resolveDirectConfig } from "../config/resolve.js";
import { ENV_API_KEY, ENV_OPENAI_API_KEY } from "../core/constants.js";
import { ConfigurationMissingError } from "../core/errors.js";
import type { ILogObj, Logger } from "../logging/logger.js";
import { WorkspaceClient, type WorkspaceClientOptions } from "../workspace/client.js";
import { createOpenAIBackend } from "./direct-backend.js";
import type { GenerationBackend } from "./types.js";
import { WorkspaceBackend } from "./workspace-backend.js";

export interface CreateBackendOptions {
  workspace?: Omit<WorkspaceClientOptions, "env" | "logger">;
  direct?: DirectConfigOptions;
  /** `fetch` used by the workspace client. */
  fetch?: typeof fetch;
  logger?: Logger<ILogObj>;
  env?: Environment;
}

/**
 * Picks exactly one backend variant.
 *
 * 1. A workspace backend when a workspace API key resolves
 * 2. Otherwise a direct OpenAI backend when an OpenAI API key resolves
 *
 * @throws ConfigurationMissingError when neither is configured
 */
export function createBackend(options: CreateBackendOptions = {}): GenerationBackend {
  const env = options.env ?? process.env;

  try {
    const client = new WorkspaceClient({
      ...options.workspace,
      fetch: options.fetch ?? options.workspace?.fetch,
      logger: options.logger?.getSubLogger({ name: "workspace" }),
      env,
    });
    return new WorkspaceBackend(client);
  } catch (error) {
    if (!(error instanceof ConfigurationMissingError)) {
      throw error;
    }
  }

  try {
    const config = resolveDirectConfig(options.direct, env);
    options.logger?.info(`No workspace API key found; using direct generation with ${config.model}`);
    return createOpenAIBackend(config, options.logger?.getSubLogger({ name: "direct" }));
  } catch (error) {
    if (error instanceof ConfigurationMissingError) {
      throw new ConfigurationMissingError(
        "A generation backend",
        `${ENV_API_KEY} (workspace) or ${ENV_OPENAI_API_KEY} (direct)`,
      );
    }
    throw error;
  }
}
