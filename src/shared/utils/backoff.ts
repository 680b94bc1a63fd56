/**
 * Configuration for automatic stage retries.
 * @property initialDelayMs - Delay before the first retry.
 * @property backoffFactor - Multiplier applied for every further attempt.
 * @property maxDelayMs - Upper bound for a single delay.
 */
export type BackoffConfig = {
    initialDelayMs: number;
    backoffFactor: number;
    maxDelayMs: number;
};

export const defaultBackoffConfig: BackoffConfig = { initialDelayMs: 1000, backoffFactor: 2, maxDelayMs: 60000 };

/**
 * Delay to wait after the given (1-based) failed attempt.
 */
export function computeBackoffDelay(attempt: number, config: BackoffConfig = defaultBackoffConfig): number {
    const exponent = Math.max(attempt - 1, 0);
    const delay = config.initialDelayMs * Math.pow(config.backoffFactor, exponent);
    return Math.min(delay, config.maxDelayMs);
}
