import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../shared/config.js';

const memoryDrivers = { PROJECT_STORE_DRIVER: 'memory', ASSET_STORE_DRIVER: 'memory' };

describe('loadConfig', () => {
    it('should apply defaults', () => {
        const config = loadConfig(memoryDrivers);

        expect(config.env).toBe('development');
        expect(config.gcp.location).toBe('us-central1');
        expect(config.safety).toEqual({ provider: 'keyword', blocklist: [], screenGeneratedAssets: false });
        expect(config.scheduler).toEqual({
            slots: { GPU: 2, CPU: 4 },
            maxAttempts: 3,
            backoff: { initialDelayMs: 1000, backoffFactor: 2, maxDelayMs: 60000 },
            timeouts: { SAFETY_CHECK: 30000, IMAGE_GEN: 120000, ANIMATE: 300000, AUDIO_MIX: 120000, COMPOSITION: 300000 },
            compositionPolicy: 'require_all',
            recheckIntervalMs: 5000,
        });
    });

    it('should coerce numbers, booleans and the blocklist', () => {
        const config = loadConfig({
            ...memoryDrivers,
            GPU_WORKER_SLOTS: '1',
            STAGE_MAX_ATTEMPTS: '5',
            SAFETY_BLOCKLIST: ' Gore, ,Blood Bath',
            SAFETY_SCREEN_ASSETS: 'true',
            COMPOSITION_POLICY: 'allow_partial',
        });

        expect(config.scheduler.slots).toEqual({ GPU: 1, CPU: 4 });
        expect(config.scheduler.maxAttempts).toBe(5);
        expect(config.scheduler.compositionPolicy).toBe('allow_partial');
        expect(config.safety.blocklist).toEqual([ 'gore', 'blood bath' ]);
        expect(config.safety.screenGeneratedAssets).toBe(true);
    });

    it('should require connection settings for the durable drivers', () => {
        expect(() => loadConfig({})).toThrow(ConfigError);
        expect(() => loadConfig({})).toThrow(/POSTGRES_URL is required/);
        expect(() => loadConfig({ POSTGRES_URL: 'postgres://localhost/test' })).toThrow(/GCP_BUCKET_NAME is required/);
    });

    it('should reject non-positive slot counts', () => {
        expect(() => loadConfig({ ...memoryDrivers, CPU_WORKER_SLOTS: '0' })).toThrow(ConfigError);
    });
});
