/**
 * Configuration options for a covermark state
 *
 * All options are optional. Environment variables fill in what the caller
 * leaves out, then conservative defaults apply.
 */

import type { LevelWithSilent, Logger } from 'pino';

import { ConfigurationError, type UnbalancedScopeError } from './errors.js';

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export const ENV_KEYS = {
  ENABLED: 'COVERMARK_ENABLED',
  LOG_LEVEL: 'COVERMARK_LOG_LEVEL',
} as const;

export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface CoverMarkOptions {
  /**
   * Turn bookkeeping on or off. Disabled instances are inert
   * (default: COVERMARK_ENABLED, else enabled unless NODE_ENV=production)
   */
  enabled?: boolean;
  /** Log level of the built-in logger (default: COVERMARK_LOG_LEVEL, else 'silent' under test, 'warn' otherwise) */
  logLevel?: LevelWithSilent;
  /** Replaces the built-in pino logger; logLevel is then ignored */
  logger?: Logger;
  /** Called with every usage fault before it is thrown */
  onUsageFault?: (error: UnbalancedScopeError) => void;
}

export interface ResolvedOptions {
  enabled: boolean;
  logLevel: LevelWithSilent;
  logger?: Logger;
  onUsageFault?: (error: UnbalancedScopeError) => void;
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Resolves user options against the environment and defaults
 *
 * @throws {ConfigurationError} When a value cannot be interpreted
 */
export function resolveOptions(
  userOptions: CoverMarkOptions = {},
  env: EnvSource = process.env
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    enabled:
      userOptions.enabled ??
      parseBooleanEnv(env, ENV_KEYS.ENABLED) ??
      env.NODE_ENV !== 'production',
    logLevel:
      userOptions.logLevel ??
      parseLogLevelEnv(env) ??
      (env.NODE_ENV === 'test' ? 'silent' : 'warn'),
    logger: userOptions.logger,
    onUsageFault: userOptions.onUsageFault,
  };

  validateOptions(resolved);
  return resolved;
}

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function parseBooleanEnv(env: EnvSource, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (TRUE_VALUES.has(raw)) return true;
  if (FALSE_VALUES.has(raw)) return false;
  throw new ConfigurationError(
    `${key} must be one of true/false/1/0/yes/no/on/off, got "${env[key]}"`,
    { option: key, value: env[key] }
  );
}

function parseLogLevelEnv(env: EnvSource): LevelWithSilent | undefined {
  const raw = env[ENV_KEYS.LOG_LEVEL]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (!isLogLevel(raw)) {
    throw new ConfigurationError(
      `${ENV_KEYS.LOG_LEVEL} must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`,
      { option: ENV_KEYS.LOG_LEVEL, value: raw }
    );
  }
  return raw;
}

/**
 * Guards against values that bypassed the type system (plain JS callers)
 */
function validateOptions(options: ResolvedOptions): void {
  if (typeof options.enabled !== 'boolean') {
    throw new ConfigurationError('enabled must be a boolean', {
      option: 'enabled',
      value: options.enabled,
    });
  }
  if (!isLogLevel(options.logLevel)) {
    throw new ConfigurationError(
      `logLevel must be one of ${LOG_LEVELS.join(', ')}`,
      { option: 'logLevel', value: options.logLevel }
    );
  }
  if (
    options.onUsageFault !== undefined &&
    typeof options.onUsageFault !== 'function'
  ) {
    throw new ConfigurationError('onUsageFault must be a function', {
      option: 'onUsageFault',
    });
  }
}
