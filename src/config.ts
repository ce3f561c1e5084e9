import { z } from "zod";
import { firstEnv, parseIntEnv, type Environment } from "./lib/env-utils.js";
import { ValidationError } from "./lib/errors.js";
import { parseWithSchema } from "./lib/schemas.js";
import { isRegion } from "./lib/validation-utils.js";
import type { ReportConfig } from "./types.js";

export const DEFAULT_REGION = "us-east-1";

/** Default safety limit for paginated describe calls. */
export const DEFAULT_MAX_PAGES = 50;

/**
 * Options as commander hands them over. `color` is false when
 * `--no-color` is given.
 */
const CliOptionsSchema = z.object({
  region: z.string().trim().min(1).optional(),
  profile: z.string().trim().min(1).optional(),
  inventory: z.string().trim().min(1).optional(),
  format: z.enum(["text", "markdown", "json"]).default("text"),
  color: z.boolean().default(true),
  verbose: z.boolean().default(false),
});

export interface ConfigContext {
  env?: Environment;
  /** Whether stdout is a terminal; colour is only ever used on one */
  stdoutIsTTY?: boolean;
}

/**
 * Builds the report configuration from CLI options and the environment.
 *
 * Precedence: flag, then environment, then default.
 *
 * @throws {ValidationError} If an option or environment value is invalid
 *
 * @example
 * ```typescript
 * const config = resolveConfig(program.opts(), {
 *   env: process.env,
 *   stdoutIsTTY: process.stdout.isTTY,
 * });
 * ```
 */
export function resolveConfig(
  rawOptions: unknown,
  context: ConfigContext = {}
): ReportConfig {
  const env = context.env ?? process.env;
  const options = parseWithSchema(CliOptionsSchema, rawOptions, "command-line options");

  const region =
    options.region ?? firstEnv(["AWS_REGION", "AWS_DEFAULT_REGION"], env) ?? DEFAULT_REGION;
  if (!isRegion(region)) {
    throw new ValidationError(`Invalid region: "${region}"`, { details: { region } });
  }

  const noColor = firstEnv(["NO_COLOR"], env) !== undefined;

  return {
    fetcher: {
      region,
      profile: options.profile ?? firstEnv(["AWS_PROFILE"], env),
      maxPages: parseIntEnv("RI_COVERAGE_MAX_PAGES", DEFAULT_MAX_PAGES, 1, 1000, env),
      endpoint: firstEnv(["AWS_ENDPOINT_URL"], env),
    },
    inventoryFile: options.inventory,
    format: options.format,
    color: options.color && !noColor && (context.stdoutIsTTY ?? false),
    verbose: options.verbose,
  };
}
