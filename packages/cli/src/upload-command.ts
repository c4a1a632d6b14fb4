import { basename } from "node:path";
import chalk from "chalk";
import type { Command } from "commander";
import { type DocumentUploader, type UploadSummary, uploadDirectory, uploadSucceeded } from "ragmate";
import type { CLIConfig } from "./config.js";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { resolveWorkspaceOptions } from "./settings.js";
import { executeAction } from "./utils.js";

export const DEFAULT_EXTENSIONS = [".txt"];

export interface UploadCommandOptions {
  ext?: string[];
}

/**
 * Uploads one directory, printing a line per file as it completes.
 */
export async function uploadWithProgress(
  client: DocumentUploader,
  directory: string,
  extensions: string[],
  env: CLIEnvironment,
): Promise<UploadSummary> {
  return uploadDirectory(client, directory, {
    extensions,
    onFound: (extension, count) => {
      env.stdout.write(`Found ${count} ${extension} files in ${directory}\n`);
    },
    onOutcome: (outcome) => {
      const name = basename(outcome.file);
      if (outcome.ok) {
        env.stdout.write(`${chalk.green("✓")} Successfully uploaded ${name}\n`);
      } else {
        env.stdout.write(`${chalk.red("✗")} Failed to upload ${name}: ${outcome.error ?? "unknown error"}\n`);
      }
    },
  });
}

export async function executeUpload(
  directory: string,
  options: UploadCommandOptions,
  env: CLIEnvironment,
  config?: CLIConfig,
): Promise<void> {
  const client = env.createWorkspaceClient(resolveWorkspaceOptions(env, config?.workspace));
  const extensions = options.ext ?? config?.upload?.extensions ?? DEFAULT_EXTENSIONS;

  const summary = await uploadWithProgress(client, directory, extensions, env);
  if (summary.missingDirectory) {
    env.stderr.write(`Directory ${directory} does not exist\n`);
    env.setExitCode(1);
    return;
  }

  env.stdout.write(`\nUpload summary: ${summary.uploaded} successful, ${summary.failed} failed\n`);
  if (!uploadSucceeded(summary)) {
    env.setExitCode(1);
  }
}

export function registerUploadCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  program
    .command(COMMANDS.upload)
    .description("Upload every matching file in a directory to the workspace.")
    .argument("<directory>", "Directory containing the documents.")
    .option(OPTION_FLAGS.extensions, OPTION_DESCRIPTIONS.extensions)
    .action((directory: string, options: UploadCommandOptions) =>
      executeAction(() => executeUpload(directory, options, env, config), env),
    );
}
