/**
 * Execution guard tests
 */

import { describe, it, expect } from '@jest/globals';
import { ExecutionGuard, GuardError } from '../src/stakevote/guard.js';
import { ErrorCodes } from '../src/stakevote/types.js';

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('ExecutionGuard', () => {
  it('should run operations one at a time in submission order', async () => {
    const guard = new ExecutionGuard();
    const log: string[] = [];

    const first = guard.run('first', async () => {
      log.push('first:start');
      await sleep(20);
      log.push('first:end');
      return 1;
    });
    const second = guard.run('second', async () => {
      log.push('second:start');
      await sleep(1);
      log.push('second:end');
      return 2;
    });

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(log).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('should reject a nested call immediately', async () => {
    const guard = new ExecutionGuard();
    let nested: unknown;

    await guard.run('outer', async () => {
      nested = await guard.run('inner', async () => 'never').catch((e: unknown) => e);
    });

    expect(nested).toBeInstanceOf(GuardError);
    expect(nested).toMatchObject({
      code: ErrorCodes.REENTRANT_CALL,
      statusCode: 409,
      message: 'Reentrant call to inner while outer is in progress',
    });
  });

  it('should keep going after an operation fails', async () => {
    const guard = new ExecutionGuard();

    const failing = guard.run('failing', async () => {
      throw new Error('boom');
    });
    const next = guard.run('next', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('should expose the operation in flight', async () => {
    const guard = new ExecutionGuard();
    expect(guard.current).toBeNull();

    const seen = await guard.run('inspect', async () => guard.current);

    expect(seen).toBe('inspect');
    expect(guard.current).toBeNull();
  });

  it('should count queued operations', async () => {
    const guard = new ExecutionGuard();

    const a = guard.run('a', async () => sleep(5));
    const b = guard.run('b', async () => sleep(5));
    expect(guard.queueSize).toBe(2);

    await Promise.all([a, b]);
    expect(guard.queueSize).toBe(0);
  });
});
