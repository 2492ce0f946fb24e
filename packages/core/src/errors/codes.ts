/**
 * Error Code Infrastructure
 * Stable error codes and the severity attached to each of them.
 */

// Severity levels used across the system
export type Severity = 'warn' | 'error' | 'fatal';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Check failures (E100–E199): the code under test missed an expectation
  MARK_NEVER_HIT = 'E100',
  COUNT_MISMATCH = 'E101',

  // Expectation errors (E200–E299)
  INVALID_EXPECTATION = 'E200',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Usage faults (E500–E599): the harness misused the API
  UNBALANCED_SCOPE = 'E500',
}

export const SEVERITY_BY_CODE = {
  [ErrorCode.MARK_NEVER_HIT]: 'error',
  [ErrorCode.COUNT_MISMATCH]: 'error',
  [ErrorCode.INVALID_EXPECTATION]: 'error',
  [ErrorCode.CONFIGURATION_ERROR]: 'error',
  [ErrorCode.UNBALANCED_SCOPE]: 'fatal',
} satisfies Record<ErrorCode, Severity>;

export function getSeverity(code: ErrorCode): Severity {
  return SEVERITY_BY_CODE[code];
}

/**
 * Fatal codes mean results gathered afterwards can no longer be trusted.
 */
export function isFatalCode(code: ErrorCode): boolean {
  return getSeverity(code) === 'fatal';
}
