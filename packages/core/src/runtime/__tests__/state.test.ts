import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';

import { CoverageState } from '../state';
import type { CoverMarkOptions } from '../../types/options';
import {
  CheckFailure,
  InvalidExpectationError,
  UnbalancedScopeError,
} from '../../types/errors';
import { ErrorCode } from '../../errors/codes';

function makeState(options: CoverMarkOptions = {}): CoverageState {
  return new CoverageState({ enabled: true, logLevel: 'silent', ...options }, {});
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the callback to throw');
}

const tick = (): Promise<void> =>
  new Promise((resolve) => {
    setImmediate(resolve);
  });

describe('CoverageState hit routing', () => {
  it('credits only the marks a scope declared', () => {
    const state = makeState();
    const guard = state.begin({ a: 2, b: 'at-least-once' });

    state.hit('a');
    state.hit('a');
    state.hit('b');
    state.hit('c');
    const report = guard.close();

    expect(report.status).toBe('passed');
    expect(report.observed).toEqual({ a: 2, b: 1 });
    expect(report.issues).toEqual([]);
    expect(state.stats()).toMatchObject({
      hits: 4,
      deliveredHits: 3,
      scopesOpened: 1,
      scopesClosed: 1,
      checksFailed: 0,
    });
  });

  it('treats a hit with no open scope as a no-op', () => {
    const state = makeState();
    expect(() => state.hit('nobody-listens')).not.toThrow();
    expect(state.stats().deliveredHits).toBe(0);
  });

  it('passes an exact count of zero when the mark never runs', () => {
    const state = makeState();
    const report = state.begin({ forbidden: 0 }).close();
    expect(report.status).toBe('passed');
    expect(report.observed).toEqual({ forbidden: 0 });
  });
});

describe('CoverageState validation', () => {
  it('raises MARK_NEVER_HIT when an at-least-once mark is missed', () => {
    const state = makeState();
    const guard = state.begin(['z']);

    const error = catchError(() => guard.close());

    expect(error).toBeInstanceOf(CheckFailure);
    if (!(error instanceof CheckFailure)) return;
    expect(error.errorCode).toBe(ErrorCode.MARK_NEVER_HIT);
    expect(error.message).toBe(
      'Check failed: mark "z" was never hit (expected at least 1 hit, observed 0)'
    );
    expect(error.issues).toEqual([
      {
        kind: 'MARK_NEVER_HIT',
        name: 'z',
        mode: { kind: 'at-least-once' },
        observed: 0,
      },
    ]);
    expect(state.openScopeCount()).toBe(0);
    expect(state.stats().checksFailed).toBe(1);
  });

  it('raises COUNT_MISMATCH when an exact count is not met', () => {
    const state = makeState();
    const guard = state.begin({ x: 2 });
    state.hit('x');

    const error = catchError(() => guard.close());

    expect(error).toBeInstanceOf(CheckFailure);
    if (!(error instanceof CheckFailure)) return;
    expect(error.errorCode).toBe(ErrorCode.COUNT_MISMATCH);
    expect(error.message).toBe(
      'Check failed: mark "x" hit count mismatch (expected exactly 2 hits, observed 1)'
    );
  });

  it('names every failing mark in one failure', () => {
    const state = makeState();
    const guard = state.begin({ a: 'at-least-once', b: 0, c: 1 });
    state.hit('b');
    state.hit('c');

    const error = catchError(() => guard.close());

    expect(error).toBeInstanceOf(CheckFailure);
    if (!(error instanceof CheckFailure)) return;
    expect(error.errorCode).toBe(ErrorCode.COUNT_MISMATCH);
    expect(error.message).toBe(
      [
        'Check failed for 2 marks:',
        '  - mark "a" was never hit (expected at least 1 hit, observed 0)',
        '  - mark "b" hit count mismatch (expected exactly 0 hits, observed 1)',
      ].join('\n')
    );
    expect(error.report.status).toBe('failed');
    expect(error.report.observed).toEqual({ a: 0, b: 1, c: 1 });
  });

  it('skips validation when closing while unwinding', () => {
    const state = makeState();
    const guard = state.begin(['never']);

    const report = guard.close({ unwinding: true });

    expect(report.status).toBe('skipped');
    expect(report.issues).toEqual([]);
    expect(state.openScopeCount()).toBe(0);
  });

  it('rejects invalid expectations without opening a scope', () => {
    const state = makeState();
    expect(() => state.begin({ a: -1 })).toThrow(InvalidExpectationError);
    expect(state.openScopeCount()).toBe(0);
    expect(state.stats().scopesOpened).toBe(0);
  });
});

describe('CoverageState nesting', () => {
  it('credits each nested scope for its own marks', () => {
    const state = makeState();
    const outer = state.begin(['x']);
    const inner = state.begin(['y']);

    state.hit('x');
    state.hit('y');

    expect(inner.close().observed).toEqual({ y: 1 });
    expect(outer.close().observed).toEqual({ x: 1 });
  });

  it('credits every open scope interested in the same mark', () => {
    const state = makeState();
    const outer = state.begin({ shared: 1 });
    const inner = state.begin({ shared: 1 });

    state.hit('shared');

    expect(inner.close().status).toBe('passed');
    expect(outer.close().status).toBe('passed');
    expect(state.stats().deliveredHits).toBe(2);
  });

  it('raises UnbalancedScopeError when closing out of LIFO order', () => {
    const state = makeState();
    const outer = state.begin(['x']);
    const inner = state.begin(['y']);
    state.hit('x');
    state.hit('y');

    const error = catchError(() => outer.close());

    expect(error).toBeInstanceOf(UnbalancedScopeError);
    expect(error).not.toBeInstanceOf(CheckFailure);
    if (!(error instanceof UnbalancedScopeError)) return;
    expect(error.reason).toBe('out-of-order');
    expect(error.errorCode).toBe(ErrorCode.UNBALANCED_SCOPE);
    expect(error.isFatal()).toBe(true);
    expect(error.message).toBe(
      'check scope #1 closed out of order on lane #2; innermost open scope is #2'
    );

    // the misclosed scope is gone; the inner one still closes normally
    expect(inner.close().status).toBe('passed');
    expect(state.openScopeCount()).toBe(0);
    expect(state.usageFaults()).toEqual([error]);
  });

  it('raises UnbalancedScopeError on a second close', () => {
    const state = makeState();
    const guard = state.begin({ a: 0 });
    guard.close();

    const error = catchError(() => guard.close());

    expect(error).toBeInstanceOf(UnbalancedScopeError);
    if (!(error instanceof UnbalancedScopeError)) return;
    expect(error.reason).toBe('already-closed');
    expect(error.message).toBe('check scope #1 was already closed');
  });

  it('passes usage faults to onUsageFault before throwing', () => {
    const onUsageFault = vi.fn();
    const state = makeState({ onUsageFault });
    const guard = state.begin({ a: 0 });
    guard.close();

    const error = catchError(() => guard.close());

    expect(onUsageFault).toHaveBeenCalledTimes(1);
    expect(onUsageFault).toHaveBeenCalledWith(error);
    expect(state.stats().usageFaults).toBe(1);
  });

  it('logs usage faults at fatal level', () => {
    const lines: string[] = [];
    const logger = pino(
      { level: 'trace' },
      { write: (line: string) => lines.push(line) }
    );
    const state = makeState({ logger });
    const guard = state.begin({ a: 0 });
    guard.close();
    catchError(() => guard.close());

    const entries = lines.map(
      (line): { level: number; msg: string; component?: string } =>
        JSON.parse(line)
    );
    const fatal = entries.filter((entry) => entry.level === 60);
    expect(fatal).toHaveLength(1);
    expect(fatal[0]?.msg).toBe('check scope #1 was already closed');
    expect(fatal[0]?.component).toBe('state');
  });
});

describe('CoverageState lanes', () => {
  it('ignores hits fired from another lane', () => {
    const state = makeState();
    const guard = state.begin(['z']);

    state.isolate(() => state.hit('z'));

    const error = catchError(() => guard.close());
    expect(error).toBeInstanceOf(CheckFailure);
    if (!(error instanceof CheckFailure)) return;
    expect(error.issues.map((issue) => issue.kind)).toEqual(['MARK_NEVER_HIT']);
  });

  it('gives an isolated lane its own empty stack', () => {
    const state = makeState();
    state.begin({ outer: 0 });

    const inside = state.isolate(() => state.openScopeCount());

    expect(inside).toBe(0);
    expect(state.openScopeCount()).toBe(1);
    expect(() => state.assertQuiescent()).toThrow(UnbalancedScopeError);
  });

  it('credits ancestor scopes from inside check()', () => {
    const state = makeState();
    const outer = state.begin(['coarse']);

    state.check(['fine'], () => {
      state.hit('coarse');
      state.hit('fine');
    });

    expect(outer.close().observed).toEqual({ coarse: 1 });
  });

  it('rejects closing a guard from a lane other than its own', () => {
    const state = makeState();
    const guard = state.isolate(() => state.begin({ a: 0 }));

    const error = catchError(() => guard.close());

    expect(error).toBeInstanceOf(UnbalancedScopeError);
    if (!(error instanceof UnbalancedScopeError)) return;
    expect(error.reason).toBe('foreign-lane');
    expect(guard.isOpen).toBe(false);
  });

  it('keeps guards opened by concurrent regions apart', async () => {
    const state = makeState();
    // each region starts from its own callback, as separate tests or requests do
    const startRegion = <T>(region: () => Promise<T>): Promise<T> =>
      new Promise((resolve, reject) => {
        setImmediate(() => {
          region().then(resolve, reject);
        });
      });

    const holder = startRegion(async () => {
      const guard = state.begin(['only-the-other-region-hits-this']);
      await tick();
      await tick();
      await tick();
      return catchError(() => guard.close());
    });
    const hitter = startRegion(async () => {
      await tick();
      state.hit('only-the-other-region-hits-this');
      return state.openScopeCount();
    });

    const [failure, hitterScopes] = await Promise.all([holder, hitter]);

    expect(failure).toBeInstanceOf(CheckFailure);
    expect(hitterScopes).toBe(0);
    expect(state.stats().deliveredHits).toBe(0);
  });

  it('holds a manual guard across awaits on its own lane', async () => {
    const state = makeState();
    const guard = state.begin({ awaited: 1 });

    await tick();
    state.hit('awaited');
    await tick();

    expect(guard.close().status).toBe('passed');
    expect(state.usageFaults()).toEqual([]);
  });

  it('keeps interleaved async checks apart', async () => {
    const state = makeState();

    const left = state.checkAsync({ left: 1, right: 0 }, async () => {
      await tick();
      state.hit('left');
      await tick();
      return 'left';
    });
    const right = state.checkAsync({ left: 0, right: 1 }, async () => {
      await tick();
      state.hit('right');
      await tick();
      return 'right';
    });

    await expect(Promise.all([left, right])).resolves.toEqual([
      'left',
      'right',
    ]);
    expect(state.openScopeCount()).toBe(0);
  });
});

describe('CoverageState guaranteed release', () => {
  it('returns the callback value from check()', () => {
    const state = makeState();
    const value = state.check(['a'], () => {
      state.hit('a');
      return 42;
    });
    expect(value).toBe(42);
  });

  it('throws CheckFailure from check() when the region misses a mark', () => {
    const state = makeState();
    expect(() => state.check(['a'], () => undefined)).toThrow(CheckFailure);
    expect(state.openScopeCount()).toBe(0);
  });

  it('rethrows the original error and leaves no scope behind', () => {
    const state = makeState();

    expect(() =>
      state.check(['never'], () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(state.openScopeCount()).toBe(0);

    // a fresh scope behaves as if nothing preceded it
    const report = state.check({ fresh: 1 }, () => {
      state.hit('fresh');
      return state.openScopeCount();
    });
    expect(report).toBe(1);
    expect(state.usageFaults()).toEqual([]);
  });

  it('rethrows async rejections and leaves no scope behind', async () => {
    const state = makeState();

    await expect(
      state.checkAsync(['never'], async () => {
        await tick();
        throw new Error('async boom');
      })
    ).rejects.toThrow('async boom');
    expect(state.openScopeCount()).toBe(0);
    expect(state.stats().checksFailed).toBe(0);
  });

  it('reports scopes left open inside check() as a usage fault', () => {
    const state = makeState();

    const error = catchError(() =>
      state.check(['a'], () => {
        state.hit('a');
        state.begin(['leaked']);
      })
    );

    expect(error).toBeInstanceOf(UnbalancedScopeError);
    if (!(error instanceof UnbalancedScopeError)) return;
    expect(error.reason).toBe('leaked-scopes');
    expect(error.message).toBe(
      'check scope #1 closed while inner scope(s) were still open: #2'
    );
    expect(state.openScopeCount()).toBe(0);
  });

  it('discards leaked scopes quietly when the region is already failing', () => {
    const state = makeState();

    expect(() =>
      state.check(['a'], () => {
        state.begin(['leaked']);
        throw new Error('original failure');
      })
    ).toThrow('original failure');
    expect(state.usageFaults()).toEqual([]);
    expect(state.openScopeCount()).toBe(0);
  });

  it('probe() returns the failed report instead of throwing', () => {
    const state = makeState();
    const report = state.probe({ a: 1, b: 1 }, () => state.hit('a'));

    expect(report.status).toBe('failed');
    expect(report.issues.map((issue) => issue.name)).toEqual(['b']);
  });
});

describe('CoverageState quiescence', () => {
  it('discards leaked scopes and raises once', () => {
    const state = makeState();
    state.begin(['a']);
    state.begin(['b']);

    const error = catchError(() => state.assertQuiescent());

    expect(error).toBeInstanceOf(UnbalancedScopeError);
    if (!(error instanceof UnbalancedScopeError)) return;
    expect(error.reason).toBe('leaked-scopes');
    expect(error.message).toBe('2 check scope(s) still open on lane #2: #1, #2');
    expect(state.openScopeCount()).toBe(0);
    expect(() => state.assertQuiescent()).not.toThrow();
  });

  it('discards leaked scopes with a warning when the test already failed', () => {
    const lines: string[] = [];
    const logger = pino(
      { level: 'warn' },
      { write: (line: string) => lines.push(line) }
    );
    const state = makeState({ logger });
    state.begin(['never']);

    expect(() => state.assertQuiescent({ unwinding: true })).not.toThrow();

    expect(state.openScopeCount()).toBe(0);
    expect(state.usageFaults()).toEqual([]);
    const entries = lines.map(
      (line): { level: number; msg: string; leakedScopeIds: number[] } =>
        JSON.parse(line)
    );
    expect(entries.map((entry) => [entry.level, entry.msg])).toEqual([
      [40, 'discarded scopes left open by a failing test'],
    ]);
    expect(entries[0]?.leakedScopeIds).toEqual([1]);
  });
});

describe('CoverageState when disabled', () => {
  it('opens inert guards and runs callbacks untouched', async () => {
    const state = new CoverageState({ enabled: false, logLevel: 'silent' }, {});

    const guard = state.begin({ anything: 3 });
    expect(guard.isInert).toBe(true);
    expect(guard.close().status).toBe('skipped');
    expect(state.check(['a'], () => 'value')).toBe('value');
    await expect(state.checkAsync(['a'], async () => 7)).resolves.toBe(7);
    expect(state.probe(['a'], () => undefined).status).toBe('skipped');
    expect(state.openScopeCount()).toBe(0);
  });
});
