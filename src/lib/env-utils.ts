import { ValidationError } from "./errors.js";

/**
 * Environment variables, as found on `process.env`.
 */
export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Returns the first non-empty value among the given environment variables.
 * Used where AWS tooling honours several names for the same setting.
 *
 * @param names - Variable names in priority order (e.g., "AWS_REGION", "AWS_DEFAULT_REGION")
 * @param env - Environment to read from
 *
 * @returns The trimmed value, or undefined if none is set
 *
 * @example
 * ```typescript
 * const region = firstEnv(["AWS_REGION", "AWS_DEFAULT_REGION"], process.env) ?? "us-east-1";
 * ```
 */
export function firstEnv(
  names: readonly string[],
  env: Environment = process.env
): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

/**
 * Parses and validates an integer environment variable with optional bounds checking.
 * Provides a default value if the environment variable is not set.
 *
 * @param name - Environment variable name (e.g., "RI_COVERAGE_MAX_PAGES")
 * @param defaultValue - Default value to use if environment variable is not set
 * @param min - Optional minimum allowed value (inclusive)
 * @param max - Optional maximum allowed value (inclusive)
 * @param env - Environment to read from
 *
 * @returns The parsed and validated integer value
 *
 * @throws {ValidationError} If the value is not a valid integer or is out of bounds
 *
 * @example
 * ```typescript
 * const maxPages = parseIntEnv("RI_COVERAGE_MAX_PAGES", 50, 1, 1000);
 * // If env var not set: returns 50
 * // If env var = "0": throws ValidationError (below min of 1)
 * // If env var = "abc": throws ValidationError (not an integer)
 * ```
 */
export function parseIntEnv(
  name: string,
  defaultValue: number,
  min?: number,
  max?: number,
  env: Environment = process.env
): number {
  const raw = env[name];
  const value = raw ? parseInt(raw, 10) : defaultValue;

  if (isNaN(value)) {
    throw new ValidationError(`Invalid ${name}: ${raw}. Must be a valid integer.`);
  }

  if (min !== undefined && value < min) {
    throw new ValidationError(`Invalid ${name}: ${value}. Must be at least ${min}.`);
  }

  if (max !== undefined && value > max) {
    throw new ValidationError(`Invalid ${name}: ${value}. Must be at most ${max}.`);
  }

  return value;
}
