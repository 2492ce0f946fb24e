import { AsyncLocalStorage } from 'node:async_hooks';

import type { CheckReport, ExpectationsInput } from '@covermark/shared';

import { MarkRegistry, type MarkHandle } from '../registry/mark-registry.js';
import {
  buildReport,
  createCheckFailure,
  evaluateScope,
} from '../reporter/reporter.js';
import { CheckFailure, UnbalancedScopeError } from '../types/errors.js';
import {
  resolveOptions,
  type CoverMarkOptions,
  type EnvSource,
  type ResolvedOptions,
} from '../types/options.js';
import {
  createBaseLogger,
  createComponentLoggers,
  type ComponentLoggers,
} from '../util/logger.js';
import { CheckScope } from './check-scope.js';
import { parseExpectations } from './expectations.js';
import {
  CheckGuard,
  inertReport,
  type CloseOptions,
  type ScopeCloser,
} from './guard.js';
import { Lane } from './lane.js';

export interface CoverageStats {
  /** mark() calls routed while enabled */
  hits: number;
  /** Scope credits; one hit can credit several nested scopes */
  deliveredHits: number;
  scopesOpened: number;
  scopesClosed: number;
  checksFailed: number;
  usageFaults: number;
}

function noopHit(_name: string): void {}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Process-wide mark/check state.
 *
 * Lanes stand in for threads: the current lane is read from an
 * AsyncLocalStorage, falling back to the root lane outside any check or
 * isolate() call. The root lane never holds a scope; openCheck() there enters
 * a lane for the calling async context. A hit only reaches scopes visible from
 * the lane it fires on, so interleaved tests never see each other's hits.
 */
export class CoverageState implements ScopeCloser {
  readonly options: ResolvedOptions;
  readonly registry: MarkRegistry;

  private readonly log: ComponentLoggers;
  private readonly lanes = new AsyncLocalStorage<Lane>();
  private readonly rootLane: Lane;
  private nextLaneId = 1;
  private nextScopeId = 1;
  private readonly faults: UnbalancedScopeError[] = [];
  private readonly counters: CoverageStats = {
    hits: 0,
    deliveredHits: 0,
    scopesOpened: 0,
    scopesClosed: 0,
    checksFailed: 0,
    usageFaults: 0,
  };

  constructor(options: CoverMarkOptions = {}, env?: EnvSource) {
    this.options = resolveOptions(options, env);
    this.log = createComponentLoggers(
      this.options.logger ?? createBaseLogger(this.options.logLevel)
    );
    this.registry = new MarkRegistry(
      this.options.enabled ? (name) => this.hit(name) : noopHit,
      this.log.registry
    );
    this.rootLane = new Lane(this.nextLaneId++);
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  defineMark(name: string): MarkHandle {
    return this.registry.register(name);
  }

  currentLane(): Lane {
    return this.lanes.getStore() ?? this.rootLane;
  }

  /**
   * Credit every open scope visible from the current lane that expects `name`.
   * Never throws.
   */
  hit(name: string): void {
    const lane = this.currentLane();
    this.counters.hits++;
    for (const scope of lane.inherited) {
      if (scope.record(name)) this.counters.deliveredHits++;
    }
    for (const scope of lane.stack) {
      if (scope.record(name)) this.counters.deliveredHits++;
    }
  }

  /**
   * Open a scope on the current lane.
   *
   * @throws {InvalidExpectationError} When the expectations cannot be parsed
   */
  begin(expectations: ExpectationsInput): CheckGuard {
    if (!this.options.enabled) return CheckGuard.inert();

    const parsed = parseExpectations(expectations).unwrap();
    const lane = this.laneForNewScope();
    const scope = new CheckScope(this.nextScopeId++, lane, parsed);
    lane.push(scope);
    this.counters.scopesOpened++;
    this.log.scope.debug(
      { scopeId: scope.id, laneId: lane.id, marks: Array.from(parsed.keys()) },
      'scope opened'
    );
    return new CheckGuard(this, scope);
  }

  /**
   * Remove the guard's scope from its lane, then validate it unless unwinding.
   *
   * @throws {CheckFailure} When an expectation does not hold
   * @throws {UnbalancedScopeError} On a double, out-of-order or foreign close
   */
  end(guard: CheckGuard, options: CloseOptions = {}): CheckReport {
    const scope = guard.scope;
    if (!scope) return inertReport();
    const unwinding = options.unwinding ?? false;

    if (!scope.isOpen) {
      if (unwinding) return buildReport(scope, 'skipped');
      throw this.usageFault(
        new UnbalancedScopeError({
          reason: 'already-closed',
          message: `check scope #${scope.id} was already closed`,
          context: { scopeId: scope.id, laneId: scope.lane.id },
        })
      );
    }

    const lane = scope.lane;
    const current = this.currentLane();
    const top = lane.top();
    lane.remove(scope);
    this.counters.scopesClosed++;

    const fault = this.detectCloseFault(scope, top, current);
    if (fault) {
      if (!unwinding) throw this.usageFault(fault);
      this.log.scope.warn(
        { scopeId: scope.id, laneId: lane.id, reason: fault.reason },
        'unbalanced close while unwinding'
      );
    }

    if (unwinding) {
      this.log.scope.debug(
        { scopeId: scope.id, laneId: lane.id },
        'scope closed while unwinding; validation skipped'
      );
      return buildReport(scope, 'skipped');
    }

    const issues = evaluateScope(scope);
    if (issues.length > 0) {
      this.counters.checksFailed++;
      const report = buildReport(scope, 'failed', issues);
      this.log.scope.debug(
        { scopeId: scope.id, laneId: lane.id, issues: issues.length },
        'scope failed'
      );
      throw createCheckFailure(report);
    }

    this.log.scope.debug({ scopeId: scope.id, laneId: lane.id }, 'scope passed');
    return buildReport(scope, 'passed');
  }

  /**
   * Run `fn` under a new scope. The scope is closed on every exit path: a
   * throw from `fn` closes it without validation and rethrows.
   */
  check<T>(expectations: ExpectationsInput, fn: () => T): T {
    if (!this.options.enabled) return fn();

    return this.lanes.run(this.forkLane(), () => {
      const guard = this.begin(expectations);
      let result: T;
      try {
        result = fn();
      } catch (error) {
        this.release(guard, true);
        throw error;
      }
      if (isPromiseLike(result)) {
        this.log.scope.warn(
          { scopeId: guard.scope?.id },
          'check() callback returned a promise; use checkAsync() to validate after it settles'
        );
      }
      this.release(guard, false);
      return result;
    });
  }

  async checkAsync<T>(
    expectations: ExpectationsInput,
    fn: () => Promise<T>
  ): Promise<T> {
    if (!this.options.enabled) return fn();

    return this.lanes.run(this.forkLane(), async () => {
      const guard = this.begin(expectations);
      let result: T;
      try {
        result = await fn();
      } catch (error) {
        this.release(guard, true);
        throw error;
      }
      this.release(guard, false);
      return result;
    });
  }

  /**
   * Like check(), but returns the report instead of throwing CheckFailure.
   * Errors thrown by `fn` still propagate.
   */
  probe(expectations: ExpectationsInput, fn: () => unknown): CheckReport {
    if (!this.options.enabled) {
      fn();
      return inertReport();
    }

    return this.lanes.run(this.forkLane(), () => {
      const guard = this.begin(expectations);
      try {
        fn();
      } catch (error) {
        this.release(guard, true);
        throw error;
      }
      try {
        return this.release(guard, false);
      } catch (error) {
        if (error instanceof CheckFailure) return error.report;
        throw error;
      }
    });
  }

  /**
   * Run `fn` in a fresh lane that sees no scope opened outside it.
   */
  isolate<T>(fn: () => T): T {
    if (!this.options.enabled) return fn();
    return this.lanes.run(new Lane(this.nextLaneId++), fn);
  }

  openScopeCount(): number {
    return this.currentLane().stack.length;
  }

  /**
   * Boundary check between tests: the current lane must have no open scope.
   * Leaked scopes are discarded before the fault is raised. When the test is
   * already failing (`unwinding`), they are discarded with a warning instead.
   *
   * @throws {UnbalancedScopeError}
   */
  assertQuiescent(options: CloseOptions = {}): void {
    const lane = this.currentLane();
    if (lane.stack.length === 0) return;

    const leaked = lane.discardAll();
    this.counters.scopesClosed += leaked.length;
    const ids = leaked.map((scope) => scope.id);
    if (options.unwinding) {
      this.log.state.warn(
        { laneId: lane.id, leakedScopeIds: ids },
        'discarded scopes left open by a failing test'
      );
      return;
    }
    throw this.usageFault(
      new UnbalancedScopeError({
        reason: 'leaked-scopes',
        message: `${leaked.length} check scope(s) still open on lane #${lane.id}: ${formatIds(ids)}`,
        context: { laneId: lane.id, leakedScopeIds: ids },
      })
    );
  }

  stats(): CoverageStats {
    return { ...this.counters };
  }

  usageFaults(): UnbalancedScopeError[] {
    return [...this.faults];
  }

  /**
   * Scopes are never pushed onto the root lane: the first scope opened in an
   * async context without a lane enters a fresh one for that context, so
   * concurrent tests and requests keep their guards apart.
   */
  private laneForNewScope(): Lane {
    const current = this.lanes.getStore();
    if (current) return current;

    const lane = new Lane(this.nextLaneId++);
    this.lanes.enterWith(lane);
    this.log.state.debug({ laneId: lane.id }, 'lane entered');
    return lane;
  }

  private forkLane(): Lane {
    return this.currentLane().fork(this.nextLaneId++);
  }

  /**
   * Close the guard opened by check()/checkAsync()/probe(), dealing with
   * scopes the region opened and never closed.
   */
  private release(guard: CheckGuard, unwinding: boolean): CheckReport {
    const scope = guard.scope;
    if (!scope || !scope.isOpen) return inertReport();

    const leaked = scope.lane.discardAbove(scope);
    if (leaked.length > 0) {
      this.counters.scopesClosed += leaked.length;
      const ids = leaked.map((inner) => inner.id);
      if (!unwinding) {
        this.end(guard, { unwinding: true });
        throw this.usageFault(
          new UnbalancedScopeError({
            reason: 'leaked-scopes',
            message: `check scope #${scope.id} closed while inner scope(s) were still open: ${formatIds(ids)}`,
            context: {
              scopeId: scope.id,
              laneId: scope.lane.id,
              leakedScopeIds: ids,
            },
          })
        );
      }
      this.log.scope.warn(
        { scopeId: scope.id, laneId: scope.lane.id, leakedScopeIds: ids },
        'discarded scopes left open by a failing region'
      );
    }
    return this.end(guard, { unwinding });
  }

  private detectCloseFault(
    scope: CheckScope,
    top: CheckScope | undefined,
    current: Lane
  ): UnbalancedScopeError | undefined {
    const context = { scopeId: scope.id, laneId: scope.lane.id };
    if (top !== scope) {
      return new UnbalancedScopeError({
        reason: 'out-of-order',
        message: `check scope #${scope.id} closed out of order on lane #${scope.lane.id}; innermost open scope is #${top?.id ?? '?'}`,
        context: { ...context, innermostScopeId: top?.id },
      });
    }
    if (current !== scope.lane) {
      return new UnbalancedScopeError({
        reason: 'foreign-lane',
        message: `check scope #${scope.id} belongs to lane #${scope.lane.id} but was closed from lane #${current.id}`,
        context: { ...context, closingLaneId: current.id },
      });
    }
    return undefined;
  }

  private usageFault(error: UnbalancedScopeError): UnbalancedScopeError {
    this.faults.push(error);
    this.counters.usageFaults++;
    this.log.state.fatal({ err: error.toJSON('prod') }, error.message);
    this.options.onUsageFault?.(error);
    return error;
  }
}

function formatIds(ids: number[]): string {
  return ids.map((id) => `#${id}`).join(', ');
}
