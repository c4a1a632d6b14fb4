import chalk from "chalk";
import type { Command } from "commander";
import type { CLIConfig } from "./config.js";
import { CLI_NAME, COMMANDS, DEFAULT_UPLOAD_DIRECTORIES } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { resolveWorkspaceName, resolveWorkspaceOptions } from "./settings.js";
import { DEFAULT_EXTENSIONS, uploadWithProgress } from "./upload-command.js";
import { executeAction } from "./utils.js";

/**
 * Provisions the workspace when it does not exist yet, then uploads every
 * configured document directory that is present.
 */
export async function executeSetup(env: CLIEnvironment, config?: CLIConfig): Promise<void> {
  env.stdout.write("ragmate workspace setup\n");
  env.stdout.write(`${"=".repeat(50)}\n`);

  const client = env.createWorkspaceClient(resolveWorkspaceOptions(env, config?.workspace));
  env.stdout.write(`${chalk.green("✓")} Connected to workspace service at ${client.apiUrl}\n`);
  env.stdout.write(`${chalk.green("✓")} Using workspace: ${client.workspaceSlug}\n`);

  const existing = await client.getWorkspace();
  if (existing) {
    env.stdout.write(`${chalk.green("✓")} Workspace found\n`);
  } else {
    env.stdout.write("Workspace not found. Creating new workspace...\n");
    if (!(await client.createWorkspace(resolveWorkspaceName(config?.workspace)))) {
      env.stdout.write(`${chalk.red("✗")} Failed to create workspace\n`);
      env.setExitCode(1);
      return;
    }
    env.stdout.write(`${chalk.green("✓")} Workspace created successfully\n`);
  }

  const directories = config?.upload?.directories ?? DEFAULT_UPLOAD_DIRECTORIES;
  const extensions = config?.upload?.extensions ?? DEFAULT_EXTENSIONS;
  let total = 0;
  let failed = 0;

  for (const directory of directories) {
    env.stdout.write(`\nUploading documents from ${directory}...\n`);
    const summary = await uploadWithProgress(client, directory, extensions, env);
    if (summary.missingDirectory) {
      env.stdout.write(`Skipping ${directory}: directory does not exist\n`);
      continue;
    }
    env.stdout.write(`Uploaded ${summary.uploaded} files from ${directory}\n`);
    total += summary.uploaded;
    failed += summary.failed;
  }

  env.stdout.write(`\nSetup complete! Total files uploaded: ${total}\n`);
  if (failed > 0) {
    env.stdout.write(`${chalk.red("✗")} ${failed} files failed to upload\n`);
    env.setExitCode(1);
  }

  if (total === 0) {
    env.stdout.write("\nNo documents were uploaded. Add document files to one of:\n");
    for (const directory of directories) {
      env.stdout.write(`  - ${directory}\n`);
    }
    env.stdout.write(`Then run "${CLI_NAME} ${COMMANDS.setup}" again, or "${CLI_NAME} ${COMMANDS.samples} --upload" for examples.\n`);
    env.stdout.write("Documents can also be uploaded manually through the service's web interface.\n");
  }
}

export function registerSetupCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  program
    .command(COMMANDS.setup)
    .description("Create the workspace if needed and upload the configured document directories.")
    .action(() => executeAction(() => executeSetup(env, config), env));
}
