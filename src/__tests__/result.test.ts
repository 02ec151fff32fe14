import { describe, it, expect } from 'vitest';
import { PersistenceError } from '../errors';
import { err, isOk, ok, unwrap, type Result } from '../types';

describe('Result', () => {
  it('ok wraps a value', () => {
    const result = ok(42);
    expect(result).toEqual({ ok: true, value: 42 });
    expect(isOk(result)).toBe(true);
  });

  it('err wraps an error', () => {
    const result: Result<number, string> = err('bad line');
    expect(result).toEqual({ ok: false, error: 'bad line' });
    expect(isOk(result)).toBe(false);
  });

  it('unwrap returns the value of ok', () => {
    expect(unwrap(ok('world.txt'))).toBe('world.txt');
  });

  it('unwrap rethrows Error instances as they are', () => {
    const failure = new PersistenceError('read_failed', '/tmp/missing.world', new Error('ENOENT'));
    expect(() => unwrap(err(failure))).toThrow(failure);
  });

  it('unwrap wraps non-Error values', () => {
    expect(() => unwrap(err('disk full'))).toThrow('disk full');
  });
});
