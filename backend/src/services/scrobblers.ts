import axios from "axios";
import { AppError, ErrorCategory, ErrorCode, errorMessage } from "../utils/errors";
import type { Track } from "../utils/track";

export type ScrobbleServiceKind = "lastfm" | "listenbrainz";

/**
 * A listen-tracking account the daemon reports to. One instance per
 * configured account.
 */
export interface ScrobbleService {
    readonly id: string;
    readonly kind: ScrobbleServiceKind;
    updateNowPlaying(track: Track): Promise<void>;
    submitListen(track: Track, listenedAt: Date): Promise<void>;
}

export class ScrobblerError extends AppError {
    constructor(
        public readonly serviceId: string,
        code: ErrorCode,
        category: ErrorCategory,
        message: string,
        details?: Record<string, unknown>
    ) {
        super(code, category, message, details);
        this.name = "ScrobblerError";
        Object.setPrototypeOf(this, ScrobblerError.prototype);
    }
}

const TRANSIENT_NETWORK_CODES = new Set([
    "ECONNRESET",
    "ECONNABORTED",
    "ECONNREFUSED",
    "ETIMEDOUT",
    "EAI_AGAIN",
    "ENOTFOUND",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "ERR_SOCKET_CLOSED",
]);

/**
 * Map an HTTP status to an error code and category.
 */
export function classifyHttpStatus(status: number): {
    code: ErrorCode;
    category: ErrorCategory;
} {
    if (status === 401 || status === 403) {
        return { code: ErrorCode.SERVICE_AUTH_FAILED, category: ErrorCategory.FATAL };
    }
    if (status === 429) {
        return {
            code: ErrorCode.SERVICE_RATE_LIMITED,
            category: ErrorCategory.TRANSIENT,
        };
    }
    if (status >= 500) {
        return {
            code: ErrorCode.SERVICE_UNAVAILABLE,
            category: ErrorCategory.TRANSIENT,
        };
    }
    return { code: ErrorCode.SERVICE_REJECTED, category: ErrorCategory.FATAL };
}

/**
 * Wrap a transport failure from axios (or anything else thrown by a request)
 * in a ScrobblerError.
 */
export function toScrobblerError(
    serviceId: string,
    operation: string,
    error: unknown
): ScrobblerError {
    if (error instanceof ScrobblerError) {
        return error;
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (typeof status === "number") {
            const { code, category } = classifyHttpStatus(status);
            return new ScrobblerError(
                serviceId,
                code,
                category,
                `${operation} failed with HTTP ${status}`,
                { status }
            );
        }

        const networkCode = error.code;
        const transient =
            networkCode === undefined || TRANSIENT_NETWORK_CODES.has(networkCode);
        return new ScrobblerError(
            serviceId,
            ErrorCode.SERVICE_NETWORK_ERROR,
            transient ? ErrorCategory.TRANSIENT : ErrorCategory.FATAL,
            `${operation} failed: ${error.message}`,
            { networkCode }
        );
    }

    return new ScrobblerError(
        serviceId,
        ErrorCode.SERVICE_NETWORK_ERROR,
        ErrorCategory.TRANSIENT,
        `${operation} failed: ${errorMessage(error)}`
    );
}
