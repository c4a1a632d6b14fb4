import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

export type { ILogObj } from "tslog";
export { Logger } from "tslog";

export const LOG_LEVEL_IDS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const DEFAULT_MIN_LEVEL = LOG_LEVEL_IDS.warn;
const MAX_WRITE_ERRORS = 5;

const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

/**
 * Parses a level given by name (`debug`) or number (`2`). Numbers are clamped to 0-6.
 */
export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  const numeric = Number(normalized);
  if (Number.isFinite(numeric)) {
    return Math.max(0, Math.min(6, Math.floor(numeric)));
  }

  return LOG_LEVEL_IDS[normalized];
}

function parseEnvFlag(value?: string): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

export interface LoggerOptions {
  /**
   * 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (or RAGMATE_LOG_LEVEL)
   */
  minLevel?: number;

  /** @default "pretty" */
  type?: "pretty" | "json" | "hidden";

  /** @default "ragmate" */
  name?: string;

  /**
   * Truncate the log file on first open instead of appending.
   * @default false (or RAGMATE_LOG_RESET)
   */
  logReset?: boolean;
}

// One stream per process, shared by every logger writing to RAGMATE_LOG_FILE
const fileSink: {
  path?: string;
  stream?: WriteStream;
  errors: number;
} = { errors: 0 };

export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Closes the shared log file. Used by tests.
 * @internal
 */
export function _resetFileLoggingState(): void {
  fileSink.stream?.end();
  fileSink.stream = undefined;
  fileSink.path = undefined;
  fileSink.errors = 0;
}

function openFileSink(path: string, reset: boolean): void {
  if (fileSink.stream && fileSink.path === path) {
    return;
  }
  fileSink.stream?.end();

  try {
    mkdirSync(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: reset ? "w" : "a" });
    stream.on("error", (error) => {
      fileSink.errors++;
      if (fileSink.errors === 1) {
        console.error(`[ragmate] Log file write error: ${error.message}`);
      }
      if (fileSink.errors >= MAX_WRITE_ERRORS) {
        console.error(`[ragmate] Too many log file errors (${fileSink.errors}), disabling file logging`);
        stream.end();
        if (fileSink.stream === stream) {
          fileSink.stream = undefined;
        }
      }
    });
    fileSink.stream = stream;
    fileSink.path = path;
    fileSink.errors = 0;
  } catch (error) {
    console.error("Failed to initialize RAGMATE_LOG_FILE output:", error);
  }
}

/**
 * Creates a tslog logger. Options win over RAGMATE_LOG_* environment variables.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "agent", minLevel: 2 });
 * const silent = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const minLevel = options.minLevel ?? parseLogLevel(process.env.RAGMATE_LOG_LEVEL) ?? DEFAULT_MIN_LEVEL;
  const type = options.type ?? "pretty";
  const logFile = process.env.RAGMATE_LOG_FILE?.trim();

  if (logFile) {
    openFileSink(logFile, options.logReset ?? parseEnvFlag(process.env.RAGMATE_LOG_RESET) ?? false);
  }
  const toFile = Boolean(fileSink.stream);

  return new Logger<ILogObj>({
    name: options.name ?? "ragmate",
    minLevel,
    type: toFile ? "pretty" : type,
    hideLogPositionForProduction: toFile || type !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: toFile
      ? {
          transportFormatted: (meta: string, args: unknown[]) => {
            const rendered = args.map((arg) =>
              typeof arg === "string" ? stripAnsi(arg) : JSON.stringify(arg),
            );
            fileSink.stream?.write(`${stripAnsi(meta)}${rendered.join(" ")}\n`);
          },
        }
      : undefined,
  });
}

export const defaultLogger = createLogger();
