import { describe, it, expect } from 'vitest';
import { KeyedLock } from './keyed-lock.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedLock', () => {
  it('should run work on the same key one at a time in arrival order', async () => {
    const lock = new KeyedLock();
    const log: string[] = [];

    await Promise.all([
      lock.run('req-1', async () => {
        log.push('a:start');
        await delay(20);
        log.push('a:end');
      }),
      lock.run('req-1', async () => {
        log.push('b:start');
        log.push('b:end');
      }),
    ]);

    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should not block different keys', async () => {
    const lock = new KeyedLock();
    const log: string[] = [];

    await Promise.all([
      lock.run('req-1', async () => {
        await delay(20);
        log.push('slow');
      }),
      lock.run('req-2', async () => {
        log.push('fast');
      }),
    ]);

    expect(log).toEqual(['fast', 'slow']);
  });

  it('should release the key after a failure', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('req-1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(lock.isHeld('req-1')).toBe(false);
    await expect(lock.run('req-1', async () => 'next')).resolves.toBe('next');
  });
});
