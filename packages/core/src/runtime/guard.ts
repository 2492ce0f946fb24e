import type { CheckReport } from '@covermark/shared';

import type { CheckScope } from './check-scope.js';

export interface CloseOptions {
  /**
   * The guarded region is exiting through an error: remove the scope but
   * skip validation so no second failure is raised.
   */
  unwinding?: boolean;
}

export interface ScopeCloser {
  end(guard: CheckGuard, options?: CloseOptions): CheckReport;
}

/**
 * Report of a close that validated nothing (disabled state)
 */
export function inertReport(): CheckReport {
  return {
    scopeId: 0,
    laneId: 0,
    status: 'skipped',
    expectations: [],
    observed: {},
    issues: [],
  };
}

/**
 * Handle returned by openCheck(). Hold it for the duration of the verified
 * region and close it on every exit path, or prefer check()/checkAsync()
 * which do that for you.
 */
export class CheckGuard {
  constructor(
    private readonly closer: ScopeCloser | undefined,
    readonly scope: CheckScope | undefined
  ) {}

  /**
   * Guard of a disabled state: closing it always reports 'skipped'
   */
  static inert(): CheckGuard {
    return new CheckGuard(undefined, undefined);
  }

  get isInert(): boolean {
    return this.scope === undefined;
  }

  get isOpen(): boolean {
    return this.scope?.isOpen ?? false;
  }

  /**
   * Validate and remove the scope.
   *
   * @throws {CheckFailure} When an expectation does not hold
   * @throws {UnbalancedScopeError} When the scope is not the innermost one of its lane
   */
  close(options?: CloseOptions): CheckReport {
    if (!this.closer) {
      return inertReport();
    }
    return this.closer.end(this, options);
  }
}
