/**
 * Error taxonomy. Every error the engine raises on purpose carries a stable
 * code and the HTTP status the transports map it to.
 */

export class ContextEngineError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly statusCode: number = 500,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'ContextEngineError';
    }
}

/** Malformed message, session id or budget. Rejected before any work is done. */
export class InputError extends ContextEngineError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'INPUT_ERROR', 400, details);
        this.name = 'InputError';
    }
}

export type DegradedReason = 'unavailable' | 'timed_out';

/**
 * Semantic narrowing could not run. Logged and reflected in payload metadata,
 * never surfaced to callers as a failure.
 */
export class DegradedModeError extends ContextEngineError {
    constructor(
        message: string,
        public readonly reason: DegradedReason,
        details?: Record<string, unknown>
    ) {
        super(message, 'DEGRADED_MODE', 503, details);
        this.name = 'DegradedModeError';
    }
}

/** The interaction store could not be read or written. */
export class StoreUnavailableError extends ContextEngineError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'STORE_UNAVAILABLE', 503, details);
        this.name = 'StoreUnavailableError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
