/**
 * Environment Variable Schema and Validation
 *
 * Defines the Zod schema for every environment variable the tool reads,
 * validates them at startup, and exports the typed result. Command-line flags
 * are applied on top of these values in unified.ts.
 */

import { z } from 'zod';
import { isJestRuntime, parseBooleanFlag } from '../../shared/utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) => parseBooleanFlag(val, defaultValue));

export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level written by the logger; warn keeps the prompt quiet */
  LOG_LEVEL: LogLevelSchema.default('warn'),

  /** Console log format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional JSON log file, in addition to stderr */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // BACKENDS
  // ===================================================================

  /** Reference engine executable, resolved on PATH */
  PERFTREE_REFERENCE_ENGINE: z.string().min(1).default('stockfish'),

  /** Upper bound for one backend query (milliseconds); 0 disables the bound */
  PERFTREE_QUERY_TIMEOUT_MS: z.coerce.number().int().min(0).default(600_000),

  /** Start sessions with the alternate castling rules enabled */
  PERFTREE_CHESS960: booleanFlag(false),

  /** Initial target depth */
  PERFTREE_DEFAULT_DEPTH: z.coerce.number().int().min(0).default(1),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];

    return { success: false, errors };
  }

  return { success: true, data: result.data };
}

/**
 * Load and validate environment variables, exiting on failure.
 */
export function loadEnvOrExit(env: Record<string, string | undefined> = process.env): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    console.error('Invalid environment configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Determine the effective node environment. Jest workers are always 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
