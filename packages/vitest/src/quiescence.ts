import type { CoverageState } from '@covermark/core';

/**
 * The part of Vitest's hook context the check reads
 */
export interface FinishedTestContext {
  task: { result?: { state: string } };
}

/**
 * afterEach hook: a test must not leave check scopes open. A test that is
 * already failing only gets its scopes discarded, so the leak never hides
 * the original failure behind a second one.
 */
export function createQuiescenceCheck(
  resolveState: () => CoverageState
): (context: FinishedTestContext) => void {
  return ({ task }) => {
    resolveState().assertQuiescent({
      unwinding: task.result?.state === 'fail',
    });
  };
}
