import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { Command } from "commander";
import { CLI_NAME, COMMANDS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { executeAction } from "./utils.js";

/**
 * Starter configuration template with helpful comments.
 */
export const STARTER_CONFIG = `# ~/.ragmate/cli.toml
# ragmate CLI configuration file
#
# Settings are resolved in this order: command-line flag, environment
# variable (or .env), this file, built-in default. The API key is read from
# RAGMATE_API_KEY only and never from this file.

[global]
# log-level = "info"              # silly, trace, debug, info, warn, error, fatal

[workspace]
# api-url = "http://localhost:3001/api"
# workspace-slug = "scientific-papers"
# workspace-name = "Scientific Papers"   # used when setup creates the workspace

[agent]
# name = "Assistant"
# system = "You are a helpful research assistant."
# memory-window = 2               # remembered messages replayed per prompt
# model = "gpt-4o-mini"           # direct generation only (no RAGMATE_API_KEY)

[upload]
# extensions = [".txt"]
# directories = ["./data/papers", "./data/papers_future", "./data/authors"]
`;

/**
 * Creates the config file with a starter template. Never overwrites.
 */
export async function executeInit(env: CLIEnvironment): Promise<void> {
  const configPath = env.configPath;

  if (existsSync(configPath)) {
    env.stderr.write(`Configuration already exists at ${configPath}\n`);
    env.stderr.write("\n");
    env.stderr.write(`To view it:  cat ${configPath}\n`);
    env.stderr.write(`To reset:    rm ${configPath} && ${CLI_NAME} ${COMMANDS.init}\n`);
    return;
  }

  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, STARTER_CONFIG, "utf-8");

  env.stderr.write(`Created ${configPath}\n`);
  env.stderr.write("\n");
  env.stderr.write("Next steps:\n");
  env.stderr.write("  1. Set your workspace API key (or OPENAI_API_KEY for direct answers):\n");
  env.stderr.write("       export RAGMATE_API_KEY=...\n");
  env.stderr.write("\n");
  env.stderr.write("  2. Customize your config:\n");
  env.stderr.write(`       $EDITOR ${configPath}\n`);
  env.stderr.write("\n");
  env.stderr.write(`Try it: ${CLI_NAME} ${COMMANDS.check}\n`);
}

export function registerInitCommand(program: Command, env: CLIEnvironment): void {
  program
    .command(COMMANDS.init)
    .description("Initialize ragmate configuration at ~/.ragmate/cli.toml")
    .action(() => executeAction(() => executeInit(env), env));
}
