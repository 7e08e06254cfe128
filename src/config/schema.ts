import { z } from 'zod';
import { LOG_LEVELS } from '../logger.js';

// --- Tagged declarations ---

export const connectionFieldsSchema = z
  .object({
    host: z.string().min(1).default('localhost'),
    port: z.coerce.number().int().min(1).max(65535).default(6379),
    db: z.coerce.number().int().min(0).default(0),
    password: z.string().optional(),
  })
  .strict();

/** Scalar fields of a queue; `conn` is a reference and is resolved by the loader. */
export const queueFieldsSchema = z
  .object({
    key: z.string().min(1),
    inflight: z.string().min(1).optional(),
  })
  .strict();

// --- Runner settings ---

const retrySchema = z
  .object({
    max_retries: z.number().int().min(0).default(5),
    base_delay_ms: z.number().int().min(0).default(200),
    max_delay_ms: z.number().int().min(0).default(5000),
  })
  .strict()
  .default({});

export const runnerSettingsSchema = z
  .object({
    shutdown_timeout_ms: z.number().int().min(0).default(10_000),
    restart: z.boolean().default(false),
    restart_delay_ms: z.number().int().min(0).default(5000),
    retry: retrySchema,
  })
  .strict()
  .default({});

export type RunnerSettingsParsed = z.infer<typeof runnerSettingsSchema>;

// --- Process environment ---

const envSchema = z.object({
  SKRODE_CONFIG: z.string().min(1).default('config.yml'),
  SKRODE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type SkrodeEnv = z.infer<typeof envSchema>;

/**
 * Read skrode's settings from environment variables.
 * Throws a ZodError naming the offending variable.
 */
export function loadEnv(env: Record<string, string | undefined> = process.env): SkrodeEnv {
  return envSchema.parse(env);
}

/** One line per issue, prefixed with the path of the offending field. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
