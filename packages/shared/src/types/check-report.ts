import type { MarkExpectation, MarkMode } from '../marks/index.js';

export type CheckIssueKind = 'MARK_NEVER_HIT' | 'COUNT_MISMATCH';

export const CHECK_ISSUE_KINDS: readonly CheckIssueKind[] = [
  'MARK_NEVER_HIT',
  'COUNT_MISMATCH',
] as const;

export interface CheckIssue {
  kind: CheckIssueKind;
  /**
   * Mark name exactly as declared in the check.
   */
  name: string;
  mode: MarkMode;
  observed: number;
}

/**
 * - 'passed': every expectation held.
 * - 'failed': at least one issue was found.
 * - 'skipped': validation did not run, either because the guarded region
 *   was unwinding or because checking is disabled.
 */
export type CheckReportStatus = 'passed' | 'failed' | 'skipped';

export const CHECK_REPORT_STATUSES: readonly CheckReportStatus[] = [
  'passed',
  'failed',
  'skipped',
] as const;

export interface CheckReport {
  scopeId: number;
  laneId: number;
  status: CheckReportStatus;
  expectations: MarkExpectation[];
  /**
   * Hits seen by the scope, keyed by mark name. Only expected names appear.
   */
  observed: Record<string, number>;
  issues: CheckIssue[];
}
