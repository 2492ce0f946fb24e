import type { MarkExpectation } from '@covermark/shared';

import type { ExpectationMap } from './expectations.js';
import type { Lane } from './lane.js';

export type ScopeStatus = 'open' | 'closed';

/**
 * One check session: declared expectations plus the hits observed while open.
 * Counters are only touched by hits on lanes that can see the scope.
 */
export class CheckScope {
  private readonly counts = new Map<string, number>();
  private status: ScopeStatus = 'open';

  constructor(
    readonly id: number,
    readonly lane: Lane,
    readonly expectations: ExpectationMap
  ) {
    for (const name of expectations.keys()) {
      this.counts.set(name, 0);
    }
  }

  get isOpen(): boolean {
    return this.status === 'open';
  }

  /**
   * Count one hit if the scope is open and expects the mark.
   * Returns whether the hit was credited.
   */
  record(name: string): boolean {
    if (this.status !== 'open') return false;
    const current = this.counts.get(name);
    if (current === undefined) return false;
    this.counts.set(name, current + 1);
    return true;
  }

  observed(name: string): number {
    return this.counts.get(name) ?? 0;
  }

  observedCounts(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }

  expectationList(): MarkExpectation[] {
    return Array.from(this.expectations, ([name, mode]) => ({ name, mode }));
  }

  close(): void {
    this.status = 'closed';
  }
}
