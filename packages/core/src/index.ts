// @covermark/core entry point
//
// Public API:
// - Top-level mark()/check()/checkAsync()/openCheck()/defineMark()/isolate()/probe()
//   bound to the lazily created default state.
// - createCoverMarks() for hermetic instances (harness composition, enable switch).
// - Building blocks: CoverageState, MarkRegistry, reporter helpers, error types.

export * from './api.js';
export * from '@covermark/shared';

export { CoverageState, type CoverageStats } from './runtime/state.js';
export { CheckGuard, type CloseOptions } from './runtime/guard.js';
export { CheckScope, type ScopeStatus } from './runtime/check-scope.js';
export { Lane } from './runtime/lane.js';
export {
  parseExpectations,
  parseMode,
  type ExpectationMap,
} from './runtime/expectations.js';
export {
  MarkRegistry,
  type MarkHandle,
  type HitSink,
} from './registry/mark-registry.js';

// Reporter
export {
  evaluateScope,
  buildReport,
  formatIssue,
  formatFailureMessage,
  createCheckFailure,
} from './reporter/reporter.js';

// Errors
export {
  ErrorCode,
  type Severity,
  getSeverity,
  isFatalCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type TestFailureView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  CoverMarkError,
  CheckFailure,
  UnbalancedScopeError,
  InvalidExpectationError,
  ConfigurationError,
  isCoverMarkError,
  type ErrorContext,
  type SerializedError,
  type UnbalancedScopeReason,
} from './types/errors.js';

// Configuration
export {
  resolveOptions,
  isLogLevel,
  LOG_LEVELS,
  ENV_KEYS,
  type CoverMarkOptions,
  type ResolvedOptions,
  type EnvSource,
} from './types/options.js';
export { type Result, Ok, Err, ok, err, isOk, isErr } from './types/result.js';
