/**
 * @tally/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const BooleanFlag = z.enum(["true", "false"]);

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),

  // Skip dispute-chain records whose client does not own the transaction
  TALLY_CHECK_CLIENT: BooleanFlag.default("true").transform((v) => v === "true"),

  // Write accounts in ascending client order instead of first-seen order
  TALLY_SORT_OUTPUT: BooleanFlag.default("false").transform((v) => v === "true"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is set to an invalid value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * One line per issue, e.g. `LOG_LEVEL: Invalid enum value...`.
 */
export function describeConfigError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("\n");
}
