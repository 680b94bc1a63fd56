import { describe, it, expect } from 'vitest';
import { ApiError } from '@google/genai';
import {
    PermanentError,
    PolicyRejection,
    StageTimeoutError,
    StorageError,
    classifyFailure,
    extractErrorDetails,
    extractErrorMessage,
} from '../../shared/utils/errors.js';
import { computeBackoffDelay } from '../../shared/utils/backoff.js';

describe('classifyFailure', () => {
    it('should map the error taxonomy onto failure classes', () => {
        expect(classifyFailure(new PolicyRejection('nsfw'))).toBe('POLICY');
        expect(classifyFailure(new PermanentError('bad input'))).toBe('PERMANENT');
        expect(classifyFailure(new StageTimeoutError(100))).toBe('TRANSIENT');
        expect(classifyFailure(new StorageError('bucket unavailable'))).toBe('TRANSIENT');
    });

    it('should classify provider errors by status', () => {
        expect(classifyFailure(new ApiError({ message: 'quota', status: 429 }))).toBe('TRANSIENT');
        expect(classifyFailure(new ApiError({ message: 'unavailable', status: 503 }))).toBe('TRANSIENT');
        expect(classifyFailure(new ApiError({ message: 'bad request', status: 400 }))).toBe('PERMANENT');
    });

    it('should treat unknown errors as transient', () => {
        expect(classifyFailure(new Error('socket hang up'))).toBe('TRANSIENT');
        expect(classifyFailure('boom')).toBe('TRANSIENT');
    });
});

describe('extractErrorMessage', () => {
    it('should format provider errors with their status', () => {
        expect(extractErrorMessage(new ApiError({ message: 'quota', status: 429 }))).toBe('API Error (Code 429): quota');
    });

    it('should read messages from errors, plain objects and primitives', () => {
        expect(extractErrorMessage(new Error('plain'))).toBe('plain');
        expect(extractErrorMessage({ message: 'from object' })).toBe('from object');
        expect(extractErrorMessage({ code: 7 })).toBe('{"code":7}');
        expect(extractErrorMessage(42)).toBe('42');
    });
});

describe('extractErrorDetails', () => {
    it('should include the cause message and reason', () => {
        const error = new PermanentError('outer', { cause: new Error('inner') });

        expect(extractErrorDetails(error)).toMatchObject({ name: 'PermanentError', message: 'outer', cause: 'inner' });
        expect(extractErrorDetails(new PolicyRejection('nsfw'))).toMatchObject({ reason: 'nsfw' });
        expect(extractErrorDetails('text')).toBeUndefined();
    });
});

describe('computeBackoffDelay', () => {
    const config = { initialDelayMs: 1000, backoffFactor: 2, maxDelayMs: 5000 };

    it('should grow geometrically from the first failed attempt', () => {
        expect([ 1, 2, 3 ].map(attempt => computeBackoffDelay(attempt, config))).toEqual([ 1000, 2000, 4000 ]);
    });

    it('should cap the delay', () => {
        expect(computeBackoffDelay(4, config)).toBe(5000);
        expect(computeBackoffDelay(10, config)).toBe(5000);
    });
});
