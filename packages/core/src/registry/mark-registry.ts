/**
 * Mark Registry for covermark
 * Keeps one handle per mark name so repeated definitions never create aliases
 */

import type { Logger } from 'pino';

/**
 * Handle to a defined mark. The name is kept verbatim so external search
 * tooling can correlate call sites with check declarations.
 */
export interface MarkHandle {
  readonly name: string;

  /**
   * Fire the mark from instrumented code
   */
  hit(): void;
}

export type HitSink = (name: string) => void;

/**
 * Registry of mark names with idempotent registration
 * Each state owns one; handles route their hits back to that state
 */
export class MarkRegistry {
  private readonly marks = new Map<string, MarkHandle>();

  constructor(
    private readonly sink: HitSink,
    private readonly log?: Logger
  ) {}

  /**
   * Register a mark (first call) or return the existing handle
   */
  register(name: string): MarkHandle {
    const existing = this.marks.get(name);
    if (existing) return existing;

    const sink = this.sink;
    const handle: MarkHandle = Object.freeze({
      name,
      hit: (): void => sink(name),
    });
    this.marks.set(name, handle);
    this.log?.debug({ markName: name }, 'mark defined');
    return handle;
  }

  has(name: string): boolean {
    return this.marks.has(name);
  }

  get(name: string): MarkHandle | undefined {
    return this.marks.get(name);
  }

  /**
   * All defined mark names, sorted
   */
  names(): string[] {
    return Array.from(this.marks.keys()).sort();
  }

  get size(): number {
    return this.marks.size;
  }
}
