import { describe, it, expect } from 'vitest';
import { AsyncLock } from './AsyncLock';

describe('AsyncLock', () => {
    it('is free until acquired', async () => {
        const lock = new AsyncLock();
        expect(lock.isHeld).toBe(false);
        const release = await lock.acquire();
        expect(lock.isHeld).toBe(true);
        release();
        expect(lock.isHeld).toBe(false);
    });

    it('grants holders in FIFO order', async () => {
        const lock = new AsyncLock();
        const order: string[] = [];
        const release = await lock.acquire();
        const second = lock.run(() => { order.push('second'); });
        const third = lock.run(async () => { order.push('third'); });
        order.push('first');
        release();
        await Promise.all([second, third]);
        expect(order).toEqual(['first', 'second', 'third']);
        expect(lock.isHeld).toBe(false);
    });

    it('ignores a second release', async () => {
        const lock = new AsyncLock();
        const release = await lock.acquire();
        release();
        release();
        const again = await lock.acquire();
        expect(lock.isHeld).toBe(true);
        again();
    });

    it('releases when the task throws', async () => {
        const lock = new AsyncLock();
        await expect(lock.run(() => { throw new Error('boom'); })).rejects.toThrow('boom');
        expect(lock.isHeld).toBe(false);
        await expect(lock.run(() => 42)).resolves.toBe(42);
    });
});
