import { ApiError as GenAIApiError } from "@google/genai";
import { FailureClass } from "../types/index.js";

/** Malformed project. Raised before any work is scheduled. */
export class BuildError extends Error {
    constructor(message: string, readonly issues: string[] = [ message ]) {
        super(message);
        this.name = 'BuildError';
    }
}

/** Content refused by the safety gate or by a provider's own safety filter. */
export class PolicyRejection extends Error {
    constructor(readonly reason: string) {
        super(`Content rejected: ${reason}`);
        this.name = 'PolicyRejection';
    }
}

export class TransientError extends Error {
    constructor(message: string, options?: { cause?: unknown; }) {
        super(message, options);
        this.name = 'TransientError';
    }
}

export class StageTimeoutError extends TransientError {
    constructor(readonly timeoutMs: number) {
        super(`Stage exceeded its ${timeoutMs}ms execution limit`);
        this.name = 'StageTimeoutError';
    }
}

export class StorageError extends TransientError {
    constructor(message: string, options?: { cause?: unknown; }) {
        super(message, options);
        this.name = 'StorageError';
    }
}

export class PermanentError extends Error {
    constructor(message: string, options?: { cause?: unknown; }) {
        super(message, options);
        this.name = 'PermanentError';
    }
}

/** Caller misuse, e.g. retrying a project that has not failed. */
export class InvalidStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidStateError';
    }
}

export class ProjectNotFoundError extends InvalidStateError {
    constructor(readonly projectId: string) {
        super(`Project ${projectId} not found`);
        this.name = 'ProjectNotFoundError';
    }
}

/** A stage transition that the state machine does not allow. Always a bug. */
export class InvariantViolation extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvariantViolation';
    }
}

const TRANSIENT_HTTP_STATUSES = new Set([ 408, 429, 500, 502, 503, 504 ]);

export function isTransientStatus(status: number): boolean {
    return TRANSIENT_HTTP_STATUSES.has(status);
}

/**
 * Maps any thrown value onto the scheduler's retry classes.
 * Unknown errors are retried within the attempt budget.
 */
export function classifyFailure(error: unknown): FailureClass {
    if (error instanceof PolicyRejection) return "POLICY";
    if (error instanceof PermanentError) return "PERMANENT";
    if (error instanceof TransientError) return "TRANSIENT";
    if (error instanceof GenAIApiError) {
        return isTransientStatus(error.status) ? "TRANSIENT" : "PERMANENT";
    }
    return "TRANSIENT";
}

export function extractErrorMessage(error: unknown): string {
    if (error instanceof GenAIApiError) {
        return `API Error (Code ${error.status}): ${error.message}`;
    }

    if (error instanceof Error) {
        return error.message || error.toString();
    }

    if (error && typeof error === 'object') {
        if ('message' in error && typeof error.message === 'string') {
            return error.message;
        }
        try {
            return JSON.stringify(error);
        } catch {
            return String(error);
        }
    }

    return String(error);
}

/**
 * Extract structured error details for logging
 */
export function extractErrorDetails(error: unknown): Record<string, unknown> | undefined {
    if (!error || typeof error !== 'object') {
        return undefined;
    }

    const details: Record<string, unknown> = {};

    if (error instanceof Error) {
        details.name = error.name;
        details.message = error.message;
        if (error.stack) details.stack = error.stack;
        if (error.cause !== undefined) details.cause = extractErrorMessage(error.cause);
    }

    if ('code' in error) details.code = error.code;
    if ('status' in error) details.status = error.status;
    if ('reason' in error) details.reason = error.reason;

    return Object.keys(details).length > 0 ? details : undefined;
}
