import { ResourceClass } from "../shared/types/index.js";

/**
 * Bounded worker slots for one resource class, fed by a FIFO of ready tickets
 * shared across projects.
 */
export class ResourcePool<T> {
    private queue: T[] = [];
    private inUse = 0;

    constructor(
        readonly resourceClass: ResourceClass,
        readonly capacity: number,
    ) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`${resourceClass} pool capacity must be a positive integer, got ${capacity}`);
        }
    }

    enqueue(ticket: T) {
        this.queue.push(ticket);
    }

    /** Puts a ticket back at the head, e.g. after a dispatch was rolled back. */
    enqueueFront(ticket: T) {
        this.queue.unshift(ticket);
    }

    /**
     * Pops the oldest ticket and takes a slot for it, or returns undefined when
     * the pool is saturated or nothing is queued.
     */
    tryAcquire(): T | undefined {
        if (this.inUse >= this.capacity || this.queue.length === 0) return undefined;
        const ticket = this.queue.shift();
        if (ticket !== undefined) this.inUse++;
        return ticket;
    }

    release() {
        if (this.inUse === 0) {
            throw new RangeError(`${this.resourceClass} pool released more slots than acquired`);
        }
        this.inUse--;
    }

    /** Removes queued tickets matching the predicate; returns how many were dropped. */
    drop(predicate: (ticket: T) => boolean): number {
        const before = this.queue.length;
        this.queue = this.queue.filter(t => !predicate(t));
        return before - this.queue.length;
    }

    get active(): number {
        return this.inUse;
    }

    get queued(): number {
        return this.queue.length;
    }

    get available(): number {
        return this.capacity - this.inUse;
    }
}
