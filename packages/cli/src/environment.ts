import type {
  CreateBackendOptions,
  Environment,
  GenerationBackend,
  ILogObj,
  Logger,
  LoggerOptions,
  WorkspaceClientOptions,
} from "ragmate";
import { createBackend, createLogger, parseLogLevel, WorkspaceClient } from "ragmate";
import { getConfigPath } from "./config.js";

/**
 * Logger configuration for CLI commands.
 */
export interface CLILoggerConfig {
  logLevel?: string;
}

/**
 * Environment abstraction for CLI dependencies and I/O.
 * Allows dependency injection for testing.
 */
export interface CLIEnvironment {
  argv: string[];
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Variables settings are resolved from. Defaults to `process.env`. */
  vars: Environment;
  /** Location of the TOML config file written by `init`. */
  configPath: string;
  createWorkspaceClient: (options: WorkspaceClientOptions) => WorkspaceClient;
  createBackend: (options: CreateBackendOptions) => GenerationBackend;
  setExitCode: (code: number) => void;
  loggerConfig?: CLILoggerConfig;
  createLogger: (name: string) => Logger<ILogObj>;
}

/**
 * Creates a logger factory based on CLI configuration.
 * Priority: CLI options > environment variables > defaults
 */
export function createLoggerFactory(config?: CLILoggerConfig): (name: string) => Logger<ILogObj> {
  return (name: string) => {
    const options: LoggerOptions = { name, type: "pretty" };

    // --log-level takes priority over RAGMATE_LOG_LEVEL
    const minLevel = parseLogLevel(config?.logLevel);
    if (minLevel !== undefined) {
      options.minLevel = minLevel;
    }

    return createLogger(options);
  };
}

/**
 * Creates the default CLI environment using Node.js process globals.
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  return {
    argv: process.argv,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    vars: process.env,
    configPath: getConfigPath(),
    createWorkspaceClient: (options) => new WorkspaceClient(options),
    createBackend: (options) => createBackend(options),
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    loggerConfig,
    createLogger: createLoggerFactory(loggerConfig),
  };
}
