import {
  AT_LEAST_ONCE,
  exactly,
  type ExpectationsInput,
  type MarkMode,
  type MarkModeInput,
} from '@covermark/shared';

import { InvalidExpectationError } from '../types/errors.js';
import { type Result, err, isErr, ok } from '../types/result.js';

export type ExpectationMap = ReadonlyMap<string, MarkMode>;

/**
 * Normalizes the public expectation forms into one name → mode map.
 * Insertion order is kept; diagnostics list marks in declaration order.
 */
export function parseExpectations(
  input: ExpectationsInput
): Result<ExpectationMap, InvalidExpectationError> {
  const parsed = new Map<string, MarkMode>();

  if (isNameList(input)) {
    for (const name of input) {
      const nameError = checkName(name);
      if (nameError) return err(nameError);
      if (parsed.has(name)) {
        return err(
          new InvalidExpectationError(
            `mark "${name}" is listed more than once; use an exact count instead`,
            { markName: name }
          )
        );
      }
      parsed.set(name, AT_LEAST_ONCE);
    }
    return ok(parsed);
  }

  if (typeof input !== 'object' || input === null) {
    return err(
      new InvalidExpectationError(
        'expectations must be an array of mark names or a record of modes',
        { value: input }
      )
    );
  }

  for (const [name, value] of Object.entries(input)) {
    const nameError = checkName(name);
    if (nameError) return err(nameError);
    const mode = parseMode(name, value);
    if (isErr(mode)) return mode;
    parsed.set(name, mode.value);
  }
  return ok(parsed);
}

export function parseMode(
  name: string,
  value: MarkModeInput
): Result<MarkMode, InvalidExpectationError> {
  if (value === 'at-least-once') return ok(AT_LEAST_ONCE);
  if (typeof value === 'number') return parseCount(name, value);
  if (typeof value === 'object' && value !== null) {
    if (value.kind === 'at-least-once') return ok(AT_LEAST_ONCE);
    if (value.kind === 'exact') return parseCount(name, value.count);
  }
  return err(
    new InvalidExpectationError(
      `mark "${name}" has an unknown mode: ${JSON.stringify(value)}`,
      { markName: name, value }
    )
  );
}

function parseCount(
  name: string,
  count: number
): Result<MarkMode, InvalidExpectationError> {
  if (!Number.isSafeInteger(count) || count < 0) {
    return err(
      new InvalidExpectationError(
        `mark "${name}" expects a non-negative integer count, got ${count}`,
        { markName: name, value: count }
      )
    );
  }
  return ok(exactly(count));
}

function checkName(name: unknown): InvalidExpectationError | undefined {
  if (typeof name !== 'string' || name.length === 0) {
    return new InvalidExpectationError(
      'mark names must be non-empty strings',
      { value: name }
    );
  }
  return undefined;
}

function isNameList(input: ExpectationsInput): input is readonly string[] {
  return Array.isArray(input);
}
