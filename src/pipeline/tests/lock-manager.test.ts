import { describe, it, expect } from 'vitest';
import { ProjectLockManager } from '../services/lock-manager.js';
import { deferred } from './helpers/fakes.js';

describe('ProjectLockManager', () => {
    it('should run work for the same key one at a time in order', async () => {
        const locks = new ProjectLockManager();
        const gate = deferred();
        const order: string[] = [];

        const first = locks.runExclusive('p1', async () => {
            order.push('first:start');
            await gate.promise;
            order.push('first:end');
        });
        const second = locks.runExclusive('p1', () => {
            order.push('second');
        });

        await Promise.resolve();
        expect(locks.isLocked('p1')).toBe(true);
        gate.resolve();
        await Promise.all([ first, second ]);

        expect(order).toEqual([ 'first:start', 'first:end', 'second' ]);
        expect(locks.isLocked('p1')).toBe(false);
        expect(locks.activeKeys).toBe(0);
    });

    it('should not block other keys', async () => {
        const locks = new ProjectLockManager();
        const gate = deferred();

        const blocked = locks.runExclusive('p1', () => gate.promise);
        await expect(locks.runExclusive('p2', () => 'done')).resolves.toBe('done');

        gate.resolve();
        await blocked;
    });

    it('should release the lock when the work throws', async () => {
        const locks = new ProjectLockManager();

        await expect(locks.runExclusive('p1', () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');
        await expect(locks.runExclusive('p1', () => 42)).resolves.toBe(42);
        expect(locks.activeKeys).toBe(0);
    });
});
