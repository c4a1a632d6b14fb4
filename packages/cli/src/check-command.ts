import chalk from "chalk";
import type { Command } from "commander";
import { workspaceName } from "ragmate";
import type { CLIConfig } from "./config.js";
import { COMMANDS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { resolveWorkspaceOptions } from "./settings.js";
import { executeAction } from "./utils.js";

/**
 * Verifies that the workspace service answers with the configured credentials.
 */
export async function executeCheck(env: CLIEnvironment, config?: CLIConfig): Promise<void> {
  const client = env.createWorkspaceClient(resolveWorkspaceOptions(env, config?.workspace));
  const info = await client.getWorkspace();

  if (!info) {
    env.stdout.write(`${chalk.red("✗")} Failed to connect to workspace "${client.workspaceSlug}" at ${client.apiUrl}\n`);
    env.stdout.write("Please check your API URL and API key in the .env file\n");
    env.setExitCode(1);
    return;
  }

  env.stdout.write(`${chalk.green("✓")} Successfully connected to ${client.apiUrl}\n`);
  env.stdout.write(`Workspace: ${workspaceName(info) ?? "Unknown"}\n`);
}

export function registerCheckCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  program
    .command(COMMANDS.check)
    .description("Check the connection to the workspace service.")
    .action(() => executeAction(() => executeCheck(env, config), env));
}
