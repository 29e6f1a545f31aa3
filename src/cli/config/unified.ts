/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a frozen
 * config object. Command-line flags are layered on top per session with
 * {@link resolveSessionConfig}.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  getEffectiveNodeEnv,
  loadEnvOrExit,
  type RawEnv,
} from './env';

// Load .env into process.env before we read anything from it. Skipped under
// test so a developer's .env cannot change test behaviour.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isTest: z.boolean(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  engines: z.object({
    referenceCommand: z.string().min(1),
    queryTimeoutMs: z.number().int().min(0),
  }),
  session: z.object({
    chess960: z.boolean(),
    defaultDepth: z.number().int().min(0),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function buildConfig(env: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);

  return ConfigSchema.parse({
    nodeEnv,
    isTest: nodeEnv === 'test',
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
    },
    engines: {
      referenceCommand: env.PERFTREE_REFERENCE_ENGINE.trim(),
      queryTimeoutMs: env.PERFTREE_QUERY_TIMEOUT_MS,
    },
    session: {
      chess960: env.PERFTREE_CHESS960,
      defaultDepth: env.PERFTREE_DEFAULT_DEPTH,
    },
  });
}

export const config: AppConfig = Object.freeze(buildConfig(loadEnvOrExit()));

/**
 * Settings for one interactive session: the environment config with any
 * command-line overrides applied.
 */
export interface SessionConfig {
  scriptCommand: string;
  referenceCommand: string;
  queryTimeoutMs: number;
  chess960: boolean;
  defaultDepth: number;
}

export interface SessionOverrides {
  scriptCommand: string;
  referenceCommand?: string | undefined;
  queryTimeoutMs?: number | undefined;
  chess960?: boolean | undefined;
}

export function resolveSessionConfig(
  overrides: SessionOverrides,
  base: AppConfig = config
): SessionConfig {
  return {
    scriptCommand: overrides.scriptCommand,
    referenceCommand: overrides.referenceCommand ?? base.engines.referenceCommand,
    queryTimeoutMs: overrides.queryTimeoutMs ?? base.engines.queryTimeoutMs,
    chess960: overrides.chess960 ?? base.session.chess960,
    defaultDepth: base.session.defaultDepth,
  };
}
