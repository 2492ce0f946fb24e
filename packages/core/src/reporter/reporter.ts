/**
 * Reporter - compares what a scope observed with what it declared
 * and turns mismatches into a CheckFailure
 */

import {
  describeMode,
  type CheckIssue,
  type CheckReport,
  type CheckReportStatus,
} from '@covermark/shared';

import type { CheckScope } from '../runtime/check-scope.js';
import { CheckFailure } from '../types/errors.js';

/**
 * Evaluate every expectation of a scope, in declaration order.
 * - at-least-once passes iff observed >= 1
 * - exact(n) passes iff observed === n
 */
export function evaluateScope(scope: CheckScope): CheckIssue[] {
  const issues: CheckIssue[] = [];
  for (const [name, mode] of scope.expectations) {
    const observed = scope.observed(name);
    if (mode.kind === 'at-least-once') {
      if (observed < 1) {
        issues.push({ kind: 'MARK_NEVER_HIT', name, mode, observed });
      }
      continue;
    }
    if (observed === mode.count) continue;
    issues.push({
      kind: observed === 0 ? 'MARK_NEVER_HIT' : 'COUNT_MISMATCH',
      name,
      mode,
      observed,
    });
  }
  return issues;
}

export function buildReport(
  scope: CheckScope,
  status: CheckReportStatus,
  issues: CheckIssue[] = []
): CheckReport {
  return {
    scopeId: scope.id,
    laneId: scope.lane.id,
    status,
    expectations: scope.expectationList(),
    observed: scope.observedCounts(),
    issues,
  };
}

export function formatIssue(issue: CheckIssue): string {
  const name = JSON.stringify(issue.name);
  const expected = describeMode(issue.mode);
  if (issue.kind === 'MARK_NEVER_HIT') {
    return `mark ${name} was never hit (expected ${expected}, observed 0)`;
  }
  return `mark ${name} hit count mismatch (expected ${expected}, observed ${issue.observed})`;
}

export function formatFailureMessage(issues: CheckIssue[]): string {
  const [first] = issues;
  if (issues.length === 1 && first) {
    return `Check failed: ${formatIssue(first)}`;
  }
  const lines = issues.map((issue) => `  - ${formatIssue(issue)}`);
  return [`Check failed for ${issues.length} marks:`, ...lines].join('\n');
}

export function createCheckFailure(report: CheckReport): CheckFailure {
  return new CheckFailure({
    message: formatFailureMessage(report.issues),
    report,
  });
}
