/**
 * Error hierarchy for covermark
 * Separates failures of the code under test from misuse of the API
 */

import type { CheckIssue, CheckReport } from '@covermark/shared';

import { ErrorCode, type Severity, getSeverity } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  markName?: string; // Mark the error is about, verbatim
  scopeId?: number;
  laneId?: number;
  option?: string; // Offending configuration key
  value?: unknown;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface CoverMarkErrorParams {
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all covermark errors
 */
export abstract class CoverMarkError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  constructor(params: CoverMarkErrorParams) {
    const { message, errorCode, context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = getSeverity(errorCode);
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  isFatal(): boolean {
    return this.severity === 'fatal';
  }
}

/**
 * The code under test did not hit the declared marks the declared number of
 * times. Behaves as an ordinary assertion failure.
 */
export class CheckFailure extends CoverMarkError {
  public readonly report: CheckReport;

  constructor(params: { message: string; report: CheckReport }) {
    const { message, report } = params;
    super({
      message,
      errorCode: report.issues.every((issue) => issue.kind === 'MARK_NEVER_HIT')
        ? ErrorCode.MARK_NEVER_HIT
        : ErrorCode.COUNT_MISMATCH,
      context: {
        scopeId: report.scopeId,
        laneId: report.laneId,
        failingMarks: report.issues.map((issue) => issue.name),
      },
    });
    this.report = report;
  }

  get issues(): CheckIssue[] {
    return this.report.issues;
  }
}

export type UnbalancedScopeReason =
  | 'out-of-order'
  | 'already-closed'
  | 'foreign-lane'
  | 'leaked-scopes';

/**
 * The harness or instrumentation used the check API incorrectly.
 * Never a failure of the code under test.
 */
export class UnbalancedScopeError extends CoverMarkError {
  public readonly reason: UnbalancedScopeReason;

  constructor(params: {
    message: string;
    reason: UnbalancedScopeReason;
    context?: ErrorContext;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.UNBALANCED_SCOPE,
      context: { reason: params.reason, ...params.context },
    });
    this.reason = params.reason;
  }
}

export class InvalidExpectationError extends CoverMarkError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.INVALID_EXPECTATION, context });
  }
}

export class ConfigurationError extends CoverMarkError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.CONFIGURATION_ERROR, context });
  }
}

export function isCoverMarkError(error: unknown): error is CoverMarkError {
  return error instanceof CoverMarkError;
}
