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
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",
    CONFIG_READ_ERROR = "CONFIG_READ_ERROR",
    CONFIG_WRITE_ERROR = "CONFIG_WRITE_ERROR",
    PERMISSION_DENIED = "PERMISSION_DENIED",

    // Now-playing source errors
    SOURCE_UNAVAILABLE = "SOURCE_UNAVAILABLE",
    SOURCE_MALFORMED = "SOURCE_MALFORMED",

    // Scrobble service errors
    SERVICE_AUTH_FAILED = "SERVICE_AUTH_FAILED",
    SERVICE_UNAVAILABLE = "SERVICE_UNAVAILABLE",
    SERVICE_RATE_LIMITED = "SERVICE_RATE_LIMITED",
    SERVICE_REJECTED = "SERVICE_REJECTED",
    SERVICE_NETWORK_ERROR = "SERVICE_NETWORK_ERROR",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
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

/** Reads `error.message` from anything thrown, falling back to its string form. */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (
        typeof error === "object" &&
        error !== null &&
        "message" in error &&
        typeof error.message === "string"
    ) {
        return error.message;
    }
    return String(error);
}

function nodeErrorCode(error: unknown): string | undefined {
    if (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        typeof error.code === "string"
    ) {
        return error.code;
    }
    return undefined;
}

/**
 * Wrap a Node.js file system error raised while reading or writing the config
 */
export function wrapNodeError(err: unknown, context: string): AppError {
    const code = nodeErrorCode(err);
    const details = { originalError: errorMessage(err) };

    if (code === "ENOENT") {
        return new AppError(
            ErrorCode.CONFIG_READ_ERROR,
            ErrorCategory.RECOVERABLE,
            `File not found: ${context}`,
            details
        );
    }

    if (code === "EACCES" || code === "EPERM") {
        return new AppError(
            ErrorCode.PERMISSION_DENIED,
            ErrorCategory.FATAL,
            `Permission denied: ${context}`,
            details
        );
    }

    if (code === "ENOSPC") {
        return new AppError(
            ErrorCode.CONFIG_WRITE_ERROR,
            ErrorCategory.TRANSIENT,
            `Disk full: ${context}`,
            details
        );
    }

    return new AppError(
        ErrorCode.CONFIG_READ_ERROR,
        ErrorCategory.RECOVERABLE,
        `File access failed: ${context}`,
        details
    );
}
