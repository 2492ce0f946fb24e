/**
 * ================================================================================
 * MARK MATCHERS - COVERMARK VITEST INTEGRATION
 *
 * Assert that a callback drives execution through instrumented marks:
 *
 *   expect(() => parseDate('92')).toHitMark('short date');
 *   expect(() => retry(op)).toHitMarks({ 'retry.attempt': 2 });
 *   expect(() => parseDate('2013-02-27')).not.toHitMark('wrong dashes');
 * ================================================================================
 */

import {
  ErrorPresenter,
  createCheckFailure,
  describeMode,
  type CheckReport,
  type CoverageState,
  type ExpectationsInput,
  type MarkModeInput,
} from '@covermark/core';

export interface MarkMatcherResult {
  pass: boolean;
  message: () => string;
  actual?: unknown;
  expected?: unknown;
}

// A type alias, not an interface: expect.extend() takes an index-signature record
export type MarkMatchers = {
  toHitMark: (
    received: unknown,
    name: string,
    mode?: MarkModeInput
  ) => MarkMatcherResult;
  toHitMarks: (
    received: unknown,
    expectations: ExpectationsInput
  ) => MarkMatcherResult;
};

const presenter = new ErrorPresenter('dev', { colors: false });

function isCallable(value: unknown): value is () => unknown {
  return typeof value === 'function';
}

function describeExpectations(report: CheckReport): string {
  return report.expectations
    .map(({ name, mode }) => `${JSON.stringify(name)} (${describeMode(mode)})`)
    .join(', ');
}

/**
 * Build the matchers against a state resolver, so they follow whichever
 * state the harness installs.
 */
export function createMarkMatchers(
  resolveState: () => CoverageState
): MarkMatchers {
  const toHitMarks = (
    received: unknown,
    expectations: ExpectationsInput
  ): MarkMatcherResult => {
    if (!isCallable(received)) {
      return {
        pass: false,
        message: () =>
          `expected a callback to run under the check, received ${typeof received}`,
      };
    }

    const report = resolveState().probe(expectations, () => received());

    if (report.status === 'failed') {
      const view = presenter.formatForTest(createCheckFailure(report));
      return {
        pass: false,
        message: () => presenter.render(view),
        actual: report.observed,
        expected: report.expectations,
      };
    }

    return {
      pass: true,
      message: () =>
        report.status === 'skipped'
          ? 'expected the callback not to satisfy the marks, but checking is disabled'
          : `expected the callback not to satisfy ${describeExpectations(report)}`,
      actual: report.observed,
      expected: report.expectations,
    };
  };

  const toHitMark = (
    received: unknown,
    name: string,
    mode: MarkModeInput = 'at-least-once'
  ): MarkMatcherResult => toHitMarks(received, { [name]: mode });

  return { toHitMark, toHitMarks };
}
