/**
 * Error types raised by ragmate.
 *
 * Every error thrown by the library extends {@link RagmateError}, so callers can
 * separate library failures from programming errors with a single `instanceof`.
 */

export class RagmateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RagmateError";
  }
}

/**
 * Raised when a value handed to message normalization (or message construction)
 * has the wrong shape. Thrown before any network call is made.
 *
 * @example
 * ```typescript
 * normalizeMessages("hello");
 * // TypeMismatchError: Expected a Message or an array of Messages, got string.
 * ```
 */
export class TypeMismatchError extends RagmateError {
  public readonly actualType: string;

  constructor(actualType: string, message?: string) {
    super(message ?? `Expected a Message or an array of Messages, got ${actualType}.`);
    this.name = "TypeMismatchError";
    this.actualType = actualType;
  }
}

/**
 * Raised at construction time when a required setting (usually an API key) is
 * absent from both the explicit options and the environment.
 */
export class ConfigurationMissingError extends RagmateError {
  public readonly setting: string;
  public readonly envVar?: string;

  constructor(setting: string, envVar?: string) {
    super(
      envVar
        ? `${setting} is required. Pass it explicitly or set ${envVar}.`
        : `${setting} is required.`,
    );
    this.name = "ConfigurationMissingError";
    this.setting = setting;
    this.envVar = envVar;
  }
}

/**
 * Raised when a generation backend cannot produce an answer: a transport
 * failure, a non-2xx response, or an SDK error. Never retried by the library.
 */
export class BackendUnavailableError extends RagmateError {
  /** HTTP status of the failed response, when the service answered at all. */
  public readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "BackendUnavailableError";
    this.status = options.status;
  }
}

/**
 * Describes the runtime type of a value for error messages.
 * Arrays and null get their own labels instead of `object`.
 */
export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    const name = value.constructor?.name;
    if (name && name !== "Object") {
      return name;
    }
    return "object";
  }
  return typeof value;
}
