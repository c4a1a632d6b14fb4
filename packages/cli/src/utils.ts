import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { ConfigurationMissingError } from "ragmate";
import { SETUP_ENV_HINTS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";

/**
 * Options for creating a numeric value parser.
 */
export interface NumericParserOptions {
  label: string;
  integer?: boolean;
  min?: number;
  max?: number;
}

/**
 * Creates a parser function for numeric command-line options with validation.
 *
 * @throws InvalidArgumentError if validation fails
 */
export function createNumericParser({
  label,
  integer = false,
  min,
  max,
}: NumericParserOptions): (value: string) => number {
  return (value: string) => {
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
      throw new InvalidArgumentError(`${label} must be a number.`);
    }

    if (integer && !Number.isInteger(parsed)) {
      throw new InvalidArgumentError(`${label} must be an integer.`);
    }

    if (min !== undefined && parsed < min) {
      throw new InvalidArgumentError(`${label} must be greater than or equal to ${min}.`);
    }

    if (max !== undefined && parsed > max) {
      throw new InvalidArgumentError(`${label} must be less than or equal to ${max}.`);
    }

    return parsed;
  };
}

/**
 * Writes the environment variables a user needs to set for the workspace service.
 */
export function writeConfigurationHint(stream: NodeJS.WritableStream): void {
  stream.write("Please set the following in your environment or .env file:\n");
  for (const hint of SETUP_ENV_HINTS) {
    stream.write(`  ${hint}\n`);
  }
}

/**
 * Runs a command action, reporting any error on stderr and setting exit code 1.
 */
export async function executeAction(
  action: () => Promise<void>,
  env: CLIEnvironment,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    env.stderr.write(`${chalk.red.bold("Error:")} ${message}\n`);
    if (error instanceof ConfigurationMissingError) {
      writeConfigurationHint(env.stderr);
    }
    env.setExitCode(1);
  }
}
