import { Pool, PoolClient, QueryResult } from 'pg';
import { EventEmitter } from 'events';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface PoolManagerConfig {
    /** Connection failures in a row that open the breaker. */
    errorThreshold?: number;
    /** How long the breaker stays open before letting one connection through. */
    resetTimeoutMs?: number;
    /** Interval of the background `SELECT 1`; 0 disables it. */
    healthCheckIntervalMs?: number;
    slowQueryThresholdMs?: number;
}

const CONNECTION_FAILURE = /timeout|connection|econnrefused|terminat/i;

const CIRCUIT_EVENTS: Record<CircuitState, string> = {
    'open': 'circuit-open',
    'half-open': 'circuit-half-open',
    'closed': 'circuit-closed',
};

/*
* Circuit breaker in front of the project store's pg pool.
* Emits `circuit-open`, `circuit-half-open` and `circuit-closed`; the scheduler
* pauses dispatching while the breaker is open.
*/
export class PoolManager extends EventEmitter {
    private readonly config: Required<PoolManagerConfig>;
    private state: CircuitState = 'closed';
    private consecutiveFailures = 0;
    private reopenTimer?: NodeJS.Timeout;
    private healthTimer?: NodeJS.Timeout;

    constructor(private readonly pool: Pool, config: PoolManagerConfig = {}) {
        super();
        this.config = {
            errorThreshold: 20,
            resetTimeoutMs: 60000,
            healthCheckIntervalMs: 30000,
            slowQueryThresholdMs: 5000,
            ...config,
        };

        this.pool.on('error', (err: Error) => {
            console.error({ error: err.message }, '[Pool] Idle client error');
            this.recordError(err);
        });

        if (this.config.healthCheckIntervalMs > 0) {
            this.healthTimer = setInterval(() => {
                this.query('SELECT 1').catch((error: unknown) => {
                    console.warn({ error: error instanceof Error ? error.message : String(error) }, '[Pool] Health check failed');
                });
            }, this.config.healthCheckIntervalMs);
            this.healthTimer.unref();
        }
    }

    getCircuitState(): CircuitState {
        return this.state;
    }

    /**
     * Counts a connection-level failure toward the breaker threshold.
     * Query errors such as constraint violations are ignored.
     */
    recordError(err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        if (!CONNECTION_FAILURE.test(message)) return;

        this.consecutiveFailures++;
        if (this.state !== 'open' && this.consecutiveFailures >= this.config.errorThreshold) {
            this.setState('open');
            clearTimeout(this.reopenTimer);
            this.reopenTimer = setTimeout(() => {
                this.consecutiveFailures = 0;
                this.setState('half-open');
            }, this.config.resetTimeoutMs);
        }
    }

    async getConnection(): Promise<PoolClient> {
        if (this.state === 'open') {
            throw new Error('[Pool] Breaker OPEN - refusing conns');
        }
        try {
            const client = await this.pool.connect();
            this.consecutiveFailures = 0;
            if (this.state === 'half-open') this.setState('closed');
            return client;
        } catch (error) {
            this.recordError(error);
            throw error;
        }
    }

    async query(text: string, params?: unknown[]): Promise<QueryResult> {
        const client = await this.getConnection();
        const started = Date.now();
        try {
            return await client.query(text, params);
        } catch (error) {
            this.recordError(error);
            throw error;
        } finally {
            client.release();
            const elapsedMs = Date.now() - started;
            if (elapsedMs > this.config.slowQueryThresholdMs) {
                console.warn({ elapsedMs, query: text.slice(0, 100) }, '[Pool] Slow query');
            }
        }
    }

    async close(): Promise<void> {
        clearInterval(this.healthTimer);
        clearTimeout(this.reopenTimer);
        this.pool.removeAllListeners('error');
        await this.pool.end();
        console.info('[Pool] Connection pool closed');
    }

    private setState(next: CircuitState) {
        if (this.state === next) return;
        const details = { from: this.state, to: next, failures: this.consecutiveFailures };
        if (next === 'open') {
            console.error(details, '[Pool] Breaker OPEN');
        } else {
            console.info(details, `[Pool] Breaker ${next.toUpperCase()}`);
        }
        this.state = next;
        this.emit(CIRCUIT_EVENTS[ next ]);
    }
}
