/**
 * Environment lookup shared by the config resolvers.
 */

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Reads an environment variable, treating blank values as unset.
 */
export function readEnvVar(key: string, env: Environment = process.env): string | undefined {
  const value = env[key];
  return isNonEmpty(value) ? value.trim() : undefined;
}

export function isNonEmpty(value: string | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * First non-empty value of: explicit option, environment variable, default.
 */
export function resolveSetting(
  explicit: string | undefined,
  envVar: string,
  env: Environment,
  fallback: string,
): string;
export function resolveSetting(
  explicit: string | undefined,
  envVar: string,
  env: Environment,
  fallback?: string,
): string | undefined;
export function resolveSetting(
  explicit: string | undefined,
  envVar: string,
  env: Environment,
  fallback?: string,
): string | undefined {
  if (isNonEmpty(explicit)) {
    return explicit.trim();
  }
  return readEnvVar(envVar, env) ?? fallback;
}
