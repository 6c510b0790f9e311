/**
 * @ledgerfold/delta-store — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // What to do with a delta segment that fails to parse
  DELTA_POLICY: z.enum(["skip", "abort"]).default("skip"),

  // Friendly name stored in a newly registered writer's metadata
  WRITER_NAME: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Strictness policy for a corrupt delta segment.
 *
 * - "skip": log it, report it as a warning, reconcile the rest
 * - "abort": fail the whole reconciliation
 */
export type DeltaPolicy = AppConfig["DELTA_POLICY"];

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var holds an invalid value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
