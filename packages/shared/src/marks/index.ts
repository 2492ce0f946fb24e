export type MarkModeKind = 'at-least-once' | 'exact';

export const MARK_MODE_KINDS: readonly MarkModeKind[] = [
  'at-least-once',
  'exact',
] as const;

export interface AtLeastOnceMode {
  kind: 'at-least-once';
}

export interface ExactCountMode {
  kind: 'exact';
  /**
   * Number of hits the scope must observe. Zero asserts the mark never runs.
   */
  count: number;
}

export type MarkMode = AtLeastOnceMode | ExactCountMode;

export const AT_LEAST_ONCE: AtLeastOnceMode = Object.freeze({
  kind: 'at-least-once',
});

/**
 * Accepted per-mark forms on the public API. A bare number is an exact count.
 */
export type MarkModeInput = 'at-least-once' | number | MarkMode;

/**
 * Either a list of names (each expected at least once) or a record mapping
 * each name to its mode.
 */
export type ExpectationsInput =
  | readonly string[]
  | Readonly<Record<string, MarkModeInput>>;

export interface MarkExpectation {
  name: string;
  mode: MarkMode;
}

export function exactly(count: number): ExactCountMode {
  return { kind: 'exact', count };
}

export function describeMode(mode: MarkMode): string {
  if (mode.kind === 'at-least-once') {
    return 'at least 1 hit';
  }
  return mode.count === 1 ? 'exactly 1 hit' : `exactly ${mode.count} hits`;
}
