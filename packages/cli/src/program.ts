import { readFileSync } from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { registerAskCommand } from "./ask-command.js";
import { registerChatCommand } from "./chat-command.js";
import { registerCheckCommand } from "./check-command.js";
import { type CLIConfig, loadConfig } from "./config.js";
import {
  CLI_DESCRIPTION,
  CLI_NAME,
  type CLILogLevel,
  LOG_LEVELS,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import type { CLIEnvironment, CLILoggerConfig } from "./environment.js";
import { createDefaultEnvironment } from "./environment.js";
import { registerInitCommand } from "./init-command.js";
import { registerSamplesCommand } from "./samples-command.js";
import { registerSearchCommand } from "./search-command.js";
import { registerSetupCommand } from "./setup-command.js";
import { registerUploadCommand } from "./upload-command.js";

/**
 * Parses and validates the log level option value.
 */
function parseLogLevel(value: string): CLILogLevel {
  const normalized = value.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

/**
 * Global CLI options that apply to all commands.
 */
interface GlobalOptions {
  logLevel?: CLILogLevel;
}

function readPackageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

/**
 * Creates and configures the CLI program with every command registered.
 *
 * @param env - CLI environment configuration for I/O and dependencies
 * @param config - Optional CLI configuration loaded from config file
 */
export function createProgram(env: CLIEnvironment, config?: CLIConfig): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(readPackageVersion())
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevel)
    .configureOutput({
      writeOut: (str) => env.stdout.write(str),
      writeErr: (str) => env.stderr.write(str),
    });

  registerCheckCommand(program, env, config);
  registerSetupCommand(program, env, config);
  registerUploadCommand(program, env, config);
  registerSamplesCommand(program, env, config);
  registerSearchCommand(program, env, config);
  registerAskCommand(program, env, config);
  registerChatCommand(program, env, config);
  registerInitCommand(program, env);

  return program;
}

/**
 * Options for runCLI function.
 */
export interface RunCLIOptions {
  /** Environment overrides for testing or customization */
  env?: Partial<CLIEnvironment>;
  /** Config override - if provided, skips loading from file. Use {} to disable config. */
  config?: CLIConfig;
}

/**
 * Main entry point for running the CLI.
 * Creates environment, parses arguments, and executes the appropriate command.
 */
export async function runCLI(opts: RunCLIOptions = {}): Promise<void> {
  const envOverrides = opts.env ?? {};

  // Config errors fail fast, before any command runs
  const config = opts.config !== undefined ? opts.config : loadConfig(envOverrides.configPath);
  const argv = envOverrides.argv ?? process.argv;

  // First pass: global options only
  const preParser = new Command();
  preParser
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevel)
    .allowUnknownOption()
    .allowExcessArguments()
    .helpOption(false);

  preParser.parse(argv);
  const globalOpts = preParser.opts<GlobalOptions>();

  // Priority: CLI flags > config file > defaults
  const loggerConfig: CLILoggerConfig = {
    logLevel: globalOpts.logLevel ?? config.global?.["log-level"],
  };

  const env: CLIEnvironment = {
    ...createDefaultEnvironment(loggerConfig),
    ...envOverrides,
  };
  const program = createProgram(env, config);
  await program.parseAsync(env.argv);
}
