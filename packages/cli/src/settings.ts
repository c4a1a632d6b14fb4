import {
  type CreateBackendOptions,
  DEFAULT_WORKSPACE_NAME,
  ENV_API_URL,
  ENV_MODEL,
  ENV_WORKSPACE_SLUG,
  resolveSetting,
  type WorkspaceClientOptions,
} from "ragmate";
import type { AgentSectionConfig, WorkspaceSectionConfig } from "./config.js";
import type { CLIEnvironment } from "./environment.js";

/**
 * Workspace client options for a command.
 * Priority: environment > config file > library default.
 */
export function resolveWorkspaceOptions(
  env: CLIEnvironment,
  config?: WorkspaceSectionConfig,
): WorkspaceClientOptions {
  return {
    apiUrl: resolveSetting(undefined, ENV_API_URL, env.vars, config?.["api-url"]),
    workspaceSlug: resolveSetting(undefined, ENV_WORKSPACE_SLUG, env.vars, config?.["workspace-slug"]),
    env: env.vars,
    logger: env.createLogger("workspace"),
  };
}

/**
 * Display name used when `setup` provisions the workspace.
 */
export function resolveWorkspaceName(config?: WorkspaceSectionConfig): string {
  return config?.["workspace-name"] ?? DEFAULT_WORKSPACE_NAME;
}

/**
 * Backend selection options for the agent commands.
 */
export function resolveBackendOptions(
  env: CLIEnvironment,
  workspace?: WorkspaceSectionConfig,
  agent?: AgentSectionConfig,
): CreateBackendOptions {
  const { apiUrl, workspaceSlug } = resolveWorkspaceOptions(env, workspace);
  return {
    workspace: { apiUrl, workspaceSlug },
    direct: { model: resolveSetting(undefined, ENV_MODEL, env.vars, agent?.model) },
    env: env.vars,
    logger: env.createLogger("backend"),
  };
}
