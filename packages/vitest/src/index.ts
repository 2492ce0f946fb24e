/**
 * ================================================================================
 * COVERMARK VITEST INTEGRATION
 *
 * Import '@covermark/vitest/setup' from a Vitest setup file to register the
 * matchers and the per-test quiescence check, or use the pieces below to wire
 * them against a custom state.
 * ================================================================================
 */

import type { ExpectationsInput, MarkModeInput } from '@covermark/core';

export {
  createMarkMatchers,
  type MarkMatchers,
  type MarkMatcherResult,
} from './matchers.js';
export {
  createQuiescenceCheck,
  type FinishedTestContext,
} from './quiescence.js';

interface CustomMatchers<R = unknown> {
  /**
   * Assert that running the callback hits a mark
   * @param name Mark name, verbatim
   * @param mode 'at-least-once' (default), an exact count, or a MarkMode
   */
  toHitMark: (name: string, mode?: MarkModeInput) => R;

  /**
   * Assert that running the callback satisfies every listed expectation
   */
  toHitMarks: (expectations: ExpectationsInput) => R;
}

declare module 'vitest' {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any -- must match Vitest's own declaration
  interface Assertion<T = any> extends CustomMatchers<T> {}
  interface AsymmetricMatchersContaining extends CustomMatchers {}
}

export { type CustomMatchers };
