import { describe, expect, it } from 'vitest';
import { LockService } from '../services/lock-service.js';
import { deferred } from './helpers.js';

describe('LockService', () => {
  it('runs tasks sharing a key one at a time in arrival order', async () => {
    const locks = new LockService();
    const order: string[] = [];
    const gate = deferred();

    const first = locks.runExclusive('phone_numbers', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = locks.runExclusive('phone_numbers', async () => {
      order.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(locks.isLocked('phone_numbers')).toBe(true);
    gate.resolve();

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(locks.isLocked('phone_numbers')).toBe(false);
  });

  it('does not hold other keys behind a busy one', async () => {
    const locks = new LockService();
    const gate = deferred();

    const slow = locks.runExclusive('blog_posts', async () => {
      await gate.promise;
      return 'slow';
    });
    await expect(locks.runExclusive('call_logs', async () => 'fast')).resolves.toBe('fast');

    gate.resolve();
    await expect(slow).resolves.toBe('slow');
  });

  it('releases the key after a task fails', async () => {
    const locks = new LockService();

    await expect(
      locks.runExclusive('call_logs', async () => {
        throw new Error('disk full');
      })
    ).rejects.toThrow('disk full');
    await expect(locks.runExclusive('call_logs', async () => 'next')).resolves.toBe('next');
  });
});
