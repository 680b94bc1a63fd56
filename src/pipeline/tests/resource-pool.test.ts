import { describe, it, expect } from 'vitest';
import { ResourcePool } from '../resource-pool.js';

describe('ResourcePool', () => {
    it('should hand out tickets in FIFO order up to capacity', () => {
        const pool = new ResourcePool<string>('GPU', 2);
        [ 'a', 'b', 'c' ].forEach(t => pool.enqueue(t));

        expect(pool.tryAcquire()).toBe('a');
        expect(pool.tryAcquire()).toBe('b');
        expect(pool.tryAcquire()).toBeUndefined();
        expect(pool.active).toBe(2);
        expect(pool.queued).toBe(1);
        expect(pool.available).toBe(0);

        pool.release();
        expect(pool.tryAcquire()).toBe('c');
    });

    it('should return undefined when nothing is queued', () => {
        const pool = new ResourcePool<string>('CPU', 1);

        expect(pool.tryAcquire()).toBeUndefined();
        expect(pool.active).toBe(0);
    });

    it('should put rolled-back tickets at the head', () => {
        const pool = new ResourcePool<string>('CPU', 1);
        pool.enqueue('a');
        pool.enqueueFront('b');

        expect(pool.tryAcquire()).toBe('b');
    });

    it('should drop queued tickets matching a predicate', () => {
        const pool = new ResourcePool<{ projectId: string; }>('CPU', 1);
        pool.enqueue({ projectId: 'p1' });
        pool.enqueue({ projectId: 'p2' });
        pool.enqueue({ projectId: 'p1' });

        expect(pool.drop(t => t.projectId === 'p1')).toBe(2);
        expect(pool.tryAcquire()).toEqual({ projectId: 'p2' });
    });

    it('should reject invalid capacities and over-release', () => {
        expect(() => new ResourcePool('GPU', 0)).toThrow('GPU pool capacity must be a positive integer, got 0');
        expect(() => new ResourcePool('GPU', 1.5)).toThrow(RangeError);
        expect(() => new ResourcePool('CPU', 1).release()).toThrow('CPU pool released more slots than acquired');
    });
});
