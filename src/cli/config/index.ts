/**
 * Configuration Module - Canonical Entry Point
 *
 * Usage:
 *   import { config, resolveSessionConfig } from './config';
 *
 * Architecture:
 * - `env.ts` - Raw environment variable schema definitions
 * - `unified.ts` - Config assembly and command-line overrides
 * - `index.ts` (this file) - Canonical re-export point
 */

export { config, buildConfig, resolveSessionConfig } from './unified';
export type { AppConfig, SessionConfig, SessionOverrides } from './unified';

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  loadEnvOrExit,
  getEffectiveNodeEnv,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
