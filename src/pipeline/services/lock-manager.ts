/**
 * Per-project serial execution. Work for one key runs strictly one at a time,
 * in submission order; different keys run concurrently.
 */
export class ProjectLockManager {
    private tails: Map<string, Promise<void>> = new Map();

    async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => { };
        const current = new Promise<void>((resolve) => { release = resolve; });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await fn();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    get activeKeys(): number {
        return this.tails.size;
    }
}
