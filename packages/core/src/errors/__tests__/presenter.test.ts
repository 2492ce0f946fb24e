import { describe, it, expect, afterEach, vi } from 'vitest';

import { AT_LEAST_ONCE, exactly } from '@covermark/shared';

import { ErrorPresenter } from '../presenter';
import { ErrorCode } from '../codes';
import {
  CheckFailure,
  ConfigurationError,
  UnbalancedScopeError,
} from '../../types/errors';

function failure(): CheckFailure {
  return new CheckFailure({
    message: 'Check failed for 2 marks',
    report: {
      scopeId: 1,
      laneId: 1,
      status: 'failed',
      expectations: [
        { name: 'a', mode: AT_LEAST_ONCE },
        { name: 'b', mode: exactly(2) },
      ],
      observed: { a: 0, b: 3 },
      issues: [
        { kind: 'MARK_NEVER_HIT', name: 'a', mode: AT_LEAST_ONCE, observed: 0 },
        { kind: 'COUNT_MISMATCH', name: 'b', mode: exactly(2), observed: 3 },
      ],
    },
  });
}

describe('ErrorPresenter', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('lists every failing mark of a CheckFailure', () => {
    const presenter = new ErrorPresenter('dev', { colors: false });
    const view = presenter.formatForTest(failure());

    expect(view).toEqual({
      title: 'Error E101: check failed for 2 marks',
      code: ErrorCode.COUNT_MISMATCH,
      severity: 'error',
      details: [
        'mark "a" was never hit (expected at least 1 hit, observed 0)',
        'mark "b" hit count mismatch (expected exactly 2 hits, observed 3)',
      ],
      hint: 'Drive the code under test through the marked path, or fix the expectation.',
      colors: false,
    });
  });

  it('renders a plain view line by line', () => {
    const presenter = new ErrorPresenter('dev', { colors: false });
    const text = presenter.render(presenter.formatForTest(failure()));

    expect(text).toBe(
      [
        'Error E101: check failed for 2 marks',
        '  - mark "a" was never hit (expected at least 1 hit, observed 0)',
        '  - mark "b" hit count mismatch (expected exactly 2 hits, observed 3)',
        '  hint: Drive the code under test through the marked path, or fix the expectation.',
      ].join('\n')
    );
  });

  it('presents usage faults with a hint for their reason', () => {
    const presenter = new ErrorPresenter('dev', { colors: false });
    const view = presenter.formatForTest(
      new UnbalancedScopeError({
        message: 'check scope #3 was already closed',
        reason: 'already-closed',
      })
    );

    expect(view.title).toBe('Usage fault E500: check scope #3 was already closed');
    expect(view.severity).toBe('fatal');
    expect(view.hint).toBe('Close each guard exactly once.');
  });

  it('falls back to code and message for other errors', () => {
    const presenter = new ErrorPresenter('dev', { colors: false });
    const view = presenter.formatForTest(new ConfigurationError('bad value'));

    expect(view.title).toBe('Error E300: bad value');
    expect(view.hint).toBeUndefined();
    expect(presenter.render(view)).toBe('Error E300: bad value');
  });

  it('honors NO_COLOR over the colors option', () => {
    vi.stubEnv('NO_COLOR', '1');
    vi.stubEnv('FORCE_COLOR', '');
    const presenter = new ErrorPresenter('dev', { colors: true });
    expect(presenter.formatForTest(new ConfigurationError('x')).colors).toBe(
      false
    );
  });

  it('paints the title when colors are on', () => {
    vi.stubEnv('NO_COLOR', '');
    vi.stubEnv('FORCE_COLOR', '');
    const presenter = new ErrorPresenter('dev', { colors: true });
    const text = presenter.render(
      presenter.formatForTest(new ConfigurationError('x'))
    );
    expect(text).toBe('\u001b[1m\u001b[31mError E300: x\u001b[39m\u001b[22m');
  });

  it('keeps the stack in dev log entries', () => {
    const presenter = new ErrorPresenter();
    const entry = presenter.formatForLog(new ConfigurationError('x'));
    expect(entry.stack).toContain('ConfigurationError: x');
  });

  it('drops the stack from prod log entries', () => {
    const presenter = new ErrorPresenter('prod');
    const entry = presenter.formatForLog(new ConfigurationError('x'));
    expect(entry.stack).toBeUndefined();
    expect(entry.errorCode).toBe(ErrorCode.CONFIGURATION_ERROR);
  });
});
