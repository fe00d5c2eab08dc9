import { describe, it, expect } from 'vitest';
import { Result } from '../common/result';

describe('Result', () => {
  it('wraps data in a success result', () => {
    const result = Result.ok([1, 2]);

    expect(result).toEqual({ success: true, data: [1, 2] });
    expect(Result.isOk(result)).toBe(true);
    expect(Result.isFail(result)).toBe(false);
  });

  it('omits the cause when none is given', () => {
    expect(Result.fail('INSUFFICIENT_DATA', 'Need at least 3 data points')).toEqual({
      success: false,
      error: { code: 'INSUFFICIENT_DATA', message: 'Need at least 3 data points' },
    });
  });

  it('keeps the cause of upstream failures', () => {
    const cause = new Error('connection reset');
    const result = Result.fail('UPSTREAM_FAILURE', 'Repository query failed', cause);

    expect(Result.isFail(result)).toBe(true);
    if (!result.success) {
      expect(result.error.cause).toBe(cause);
    }
  });

  it('unwraps successes and throws on failures', () => {
    expect(Result.unwrap(Result.ok('value'))).toBe('value');
    expect(() => Result.unwrap(Result.fail('INVALID_INPUT', 'window must be positive'))).toThrow(
      'INVALID_INPUT: window must be positive'
    );
  });

  it('falls back to the default for failures', () => {
    expect(Result.unwrapOr<number>(Result.fail('INSUFFICIENT_DATA', 'none'), 0)).toBe(0);
  });

  it('maps successes and passes failures through', () => {
    expect(Result.map(Result.ok(2), n => n * 10)).toEqual({ success: true, data: 20 });

    const failure = Result.fail('INSUFFICIENT_DATA', 'none');
    expect(Result.map<number, number>(failure, n => n * 10)).toBe(failure);
  });
});
