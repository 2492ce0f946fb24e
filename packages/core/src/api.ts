import type { CheckReport, ExpectationsInput } from '@covermark/shared';
import type { Logger } from 'pino';

import type { MarkHandle } from './registry/mark-registry.js';
import type { CheckGuard } from './runtime/guard.js';
import { CoverageState } from './runtime/state.js';
import { ConfigurationError } from './types/errors.js';
import {
  resolveOptions,
  type CoverMarkOptions,
  type EnvSource,
} from './types/options.js';
import { createBaseLogger } from './util/logger.js';

/**
 * The mark/check primitives bound to one state.
 */
export interface CoverMarks {
  readonly state: CoverageState;
  readonly enabled: boolean;
  /** Fire a mark. Does nothing at all when checking is disabled. */
  mark(name: string): void;
  defineMark(name: string): MarkHandle;
  openCheck(expectations: ExpectationsInput): CheckGuard;
  check<T>(expectations: ExpectationsInput, fn: () => T): T;
  checkAsync<T>(
    expectations: ExpectationsInput,
    fn: () => Promise<T>
  ): Promise<T>;
  probe(expectations: ExpectationsInput, fn: () => unknown): CheckReport;
  isolate<T>(fn: () => T): T;
}

function noop(_name: string): void {}

/**
 * Build a hermetic set of primitives. `enabled: false` yields inert ones:
 * `mark` is an empty function and checks validate nothing.
 */
export function createCoverMarks(
  options: CoverMarkOptions = {},
  env?: EnvSource
): CoverMarks {
  return bindCoverMarks(new CoverageState(options, env));
}

export function bindCoverMarks(state: CoverageState): CoverMarks {
  return {
    state,
    enabled: state.enabled,
    mark: state.enabled ? (name) => state.hit(name) : noop,
    defineMark: (name) => state.defineMark(name),
    openCheck: (expectations) => state.begin(expectations),
    check: (expectations, fn) => state.check(expectations, fn),
    checkAsync: (expectations, fn) => state.checkAsync(expectations, fn),
    probe: (expectations, fn) => state.probe(expectations, fn),
    isolate: (fn) => state.isolate(fn),
  };
}

// ============================================================================
// DEFAULT STATE
// ============================================================================

let defaultState: CoverageState | undefined;

/**
 * The process-wide state behind the top-level functions, created on first use
 * from the environment.
 */
export function getDefaultState(): CoverageState {
  defaultState ??= new CoverageState();
  return defaultState;
}

/**
 * Enable switch of the default state, read once at load. An unreadable
 * environment disables checking instead of failing the import of every
 * instrumented module.
 */
export function resolveDefaultEnabled(
  env: EnvSource = process.env,
  log?: Logger
): boolean {
  try {
    return resolveOptions({}, env).enabled;
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    (log ?? createBaseLogger('warn')).warn(
      { err: error.toJSON('prod') },
      `checking disabled: ${error.message}`
    );
    return false;
  }
}

// Resolved once at load so a disabled process binds `mark` to an empty function
const DEFAULT_ENABLED = resolveDefaultEnabled();

export const mark: (name: string) => void = DEFAULT_ENABLED
  ? (name) => getDefaultState().hit(name)
  : noop;

export function defineMark(name: string): MarkHandle {
  return getDefaultState().defineMark(name);
}

export function openCheck(expectations: ExpectationsInput): CheckGuard {
  return getDefaultState().begin(expectations);
}

export function check<T>(expectations: ExpectationsInput, fn: () => T): T {
  return getDefaultState().check(expectations, fn);
}

export function checkAsync<T>(
  expectations: ExpectationsInput,
  fn: () => Promise<T>
): Promise<T> {
  return getDefaultState().checkAsync(expectations, fn);
}

export function probe(
  expectations: ExpectationsInput,
  fn: () => unknown
): CheckReport {
  return getDefaultState().probe(expectations, fn);
}

export function isolate<T>(fn: () => T): T {
  return getDefaultState().isolate(fn);
}
