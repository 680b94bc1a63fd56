import { ApiError } from "@google/genai";
import {
    PermanentError,
    PolicyRejection,
    TransientError,
    extractErrorMessage,
    isTransientStatus,
} from "../../utils/errors.js";

const SAFETY_MARKERS = [ 'safety', 'violate', 'responsible ai', 'blocked', 'prohibited' ];

export function isSafetyMessage(message: string): boolean {
    const lower = message.toLowerCase();
    return SAFETY_MARKERS.some(marker => lower.includes(marker));
}

export function isAbortError(error: unknown): error is Error {
    return error instanceof Error && error.name === 'AbortError';
}

/**
 * Maps a provider failure onto the adapter error taxonomy.
 * 429 and 5xx are transient, other 4xx permanent, RAI filtering is a policy rejection.
 */
export function toCapabilityError(error: unknown, context: string): Error {
    if (
        error instanceof PolicyRejection ||
        error instanceof TransientError ||
        error instanceof PermanentError ||
        isAbortError(error)
    ) {
        return error;
    }

    if (error instanceof ApiError) {
        if (isTransientStatus(error.status)) {
            return new TransientError(`${context}: ${extractErrorMessage(error)}`, { cause: error });
        }
        if (isSafetyMessage(error.message)) {
            return new PolicyRejection(error.message);
        }
        return new PermanentError(`${context}: ${extractErrorMessage(error)}`, { cause: error });
    }

    // Network resets, DNS failures and other unclassified errors
    return new TransientError(`${context}: ${extractErrorMessage(error)}`, { cause: error });
}
