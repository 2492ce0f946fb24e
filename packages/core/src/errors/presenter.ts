/**
 * ErrorPresenter - pure presentation layer for CoverMarkError instances
 * - No checking logic; formats into test-output and log views
 */

import type { ErrorCode, Severity } from './codes.js';
import { formatIssue } from '../reporter/reporter.js';
import {
  CheckFailure,
  UnbalancedScopeError,
  type CoverMarkError,
  type SerializedError,
  type UnbalancedScopeReason,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
}

export interface TestFailureView {
  title: string;
  code: ErrorCode;
  severity: Severity;
  details: string[];
  hint?: string;
  colors: boolean;
}

const HINTS_BY_REASON: Record<UnbalancedScopeReason, string> = {
  'out-of-order': 'Close check scopes in reverse order of opening.',
  'already-closed': 'Close each guard exactly once.',
  'foreign-lane':
    'Close a guard from the execution context that opened it, or use check()/checkAsync().',
  'leaked-scopes':
    'Close every guard opened inside the region, or use check()/checkAsync().',
};

const CHECK_FAILURE_HINT =
  'Drive the code under test through the marked path, or fix the expectation.';

const ANSI = {
  red: (text: string) => `\u001b[31m${text}\u001b[39m`,
  bold: (text: string) => `\u001b[1m${text}\u001b[22m`,
  dim: (text: string) => `\u001b[2m${text}\u001b[22m`,
};

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod' = 'dev',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForTest(error: CoverMarkError): TestFailureView {
    const colors = this.#shouldUseColors(this.options.colors);

    if (error instanceof CheckFailure) {
      const count = error.issues.length;
      return {
        title: `Error ${error.errorCode}: check failed for ${count} mark${count === 1 ? '' : 's'}`,
        code: error.errorCode,
        severity: error.severity,
        details: error.issues.map(formatIssue),
        hint: CHECK_FAILURE_HINT,
        colors,
      };
    }

    if (error instanceof UnbalancedScopeError) {
      return {
        title: `Usage fault ${error.errorCode}: ${error.message}`,
        code: error.errorCode,
        severity: error.severity,
        details: [],
        hint: HINTS_BY_REASON[error.reason],
        colors,
      };
    }

    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      severity: error.severity,
      details: [],
      colors,
    };
  }

  render(view: TestFailureView): string {
    const paint = (fn: (text: string) => string, text: string): string =>
      view.colors ? fn(text) : text;

    const lines = [paint(ANSI.bold, paint(ANSI.red, view.title))];
    for (const detail of view.details) {
      lines.push(`  - ${detail}`);
    }
    if (view.hint) {
      lines.push(paint(ANSI.dim, `  hint: ${view.hint}`));
    }
    return lines.join('\n');
  }

  formatForLog(error: CoverMarkError): SerializedError {
    return error.toJSON(this.env);
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }
}

