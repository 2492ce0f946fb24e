import type { CheckScope } from './check-scope.js';

/**
 * An execution lane: the unit of hit isolation.
 *
 * A lane owns a LIFO stack of scopes (innermost last). A forked lane also
 * sees the scopes its parent had open when it was forked, so outer checks
 * keep receiving credit; a fresh lane sees nothing but its own stack.
 */
export class Lane {
  readonly stack: CheckScope[] = [];

  constructor(
    readonly id: number,
    readonly inherited: readonly CheckScope[] = []
  ) {}

  fork(id: number): Lane {
    return new Lane(id, this.visibleScopes());
  }

  visibleScopes(): CheckScope[] {
    return [...this.inherited.filter((scope) => scope.isOpen), ...this.stack];
  }

  push(scope: CheckScope): void {
    this.stack.push(scope);
  }

  top(): CheckScope | undefined {
    return this.stack[this.stack.length - 1];
  }

  remove(scope: CheckScope): boolean {
    const index = this.stack.indexOf(scope);
    if (index < 0) return false;
    this.stack.splice(index, 1);
    scope.close();
    return true;
  }

  /**
   * Close and drop every scope opened after `scope`. Returns them innermost last.
   */
  discardAbove(scope: CheckScope): CheckScope[] {
    const index = this.stack.indexOf(scope);
    if (index < 0) return [];
    return this.discardFrom(index + 1);
  }

  discardAll(): CheckScope[] {
    return this.discardFrom(0);
  }

  private discardFrom(index: number): CheckScope[] {
    const dropped = this.stack.splice(index);
    for (const scope of dropped) {
      scope.close();
    }
    return dropped;
  }
}
