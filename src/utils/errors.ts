/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Retry might succeed
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Startup errors
    INVALID_CONFIG = "INVALID_CONFIG",
    CATALOGUE_UNAVAILABLE = "CATALOGUE_UNAVAILABLE",
    ALREADY_RUNNING = "ALREADY_RUNNING",

    // Playback errors
    MEDIA_UNREADABLE = "MEDIA_UNREADABLE",
    SINK_FAILURE = "SINK_FAILURE",
    ENGINE_STOPPED = "ENGINE_STOPPED",

    // Command input errors
    INVALID_TRACK = "INVALID_TRACK",
    INVALID_PERFORMER = "INVALID_PERFORMER",
    INVALID_LOOP_MODE = "INVALID_LOOP_MODE",

    // Recovered conditions (logged, never thrown to callers)
    SNAPSHOT_CORRUPT = "SNAPSHOT_CORRUPT",
    LOCK_STALE = "LOCK_STALE",
}

export type ErrorDetails = Record<string, unknown>;

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: ErrorDetails
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
    if (!(error instanceof AppError)) {
        return false;
    }
    return code === undefined || error.code === code;
}

/**
 * Structural check: errors raised by Node's fs bindings do not pass
 * `instanceof Error` inside a separate VM context such as Jest's.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        typeof error.code === "string"
    );
}

export function errorMessage(error: unknown): string {
    if (typeof error === "object" && error !== null && "message" in error) {
        return String(error.message);
    }
    return String(error);
}
