import axios, { AxiosInstance } from "axios";
import { createHash } from "crypto";
import { BRAND_USER_AGENT } from "../config/brand";
import { logger } from "../utils/logger";
import { ErrorCategory, ErrorCode } from "../utils/errors";
import { formatTrack, type Track } from "../utils/track";
import {
    ScrobblerError,
    toScrobblerError,
    type ScrobbleService,
} from "./scrobblers";

export const LASTFM_API_URL = "https://ws.audioscrobbler.com/2.0/";

export interface LastFmCredentials {
    apiKey: string;
    apiSecret: string;
    sessionKey: string;
}

interface LastFmErrorBody {
    error: number;
    message?: string;
}

// https://www.last.fm/api/errorcodes
const FATAL_LASTFM_ERRORS = new Set([4, 9, 10, 13, 26]);
const TRANSIENT_LASTFM_ERRORS = new Set([11, 16, 29]);

const log = logger.child("lastfm");

/**
 * api_sig: md5 of every parameter except format/callback, sorted by name and
 * concatenated as name+value, followed by the shared secret.
 */
export function signLastFmParams(
    params: Record<string, string>,
    apiSecret: string
): string {
    const payload = Object.keys(params)
        .filter((key) => key !== "format" && key !== "callback")
        .sort()
        .map((key) => `${key}${params[key]}`)
        .join("");
    return createHash("md5").update(`${payload}${apiSecret}`, "utf8").digest("hex");
}

export function isLastFmErrorBody(value: unknown): value is LastFmErrorBody {
    return (
        typeof value === "object" &&
        value !== null &&
        "error" in value &&
        typeof value.error === "number"
    );
}

export function lastFmApiError(
    serviceId: string,
    method: string,
    body: LastFmErrorBody
): ScrobblerError {
    let code = ErrorCode.SERVICE_REJECTED;
    let category = ErrorCategory.FATAL;
    if (FATAL_LASTFM_ERRORS.has(body.error)) {
        code = ErrorCode.SERVICE_AUTH_FAILED;
    } else if (TRANSIENT_LASTFM_ERRORS.has(body.error)) {
        code =
            body.error === 29
                ? ErrorCode.SERVICE_RATE_LIMITED
                : ErrorCode.SERVICE_UNAVAILABLE;
        category = ErrorCategory.TRANSIENT;
    }

    return new ScrobblerError(
        serviceId,
        code,
        category,
        `${method} failed: Last.fm error ${body.error}${body.message ? ` (${body.message})` : ""}`,
        { lastfmError: body.error }
    );
}

/** Signed POST to the Audioscrobbler 2.0 endpoint. Shared with the auth flow. */
export async function postLastFm(
    client: AxiosInstance,
    serviceId: string,
    method: string,
    params: Record<string, string>,
    credentials: Pick<LastFmCredentials, "apiKey" | "apiSecret">
): Promise<unknown> {
    const unsigned: Record<string, string> = {
        ...params,
        method,
        api_key: credentials.apiKey,
    };
    const body = new URLSearchParams({
        ...unsigned,
        api_sig: signLastFmParams(unsigned, credentials.apiSecret),
        format: "json",
    });

    let data: unknown;
    try {
        const response = await client.post<unknown>("", body.toString(), {
            headers: { "Content-Type": "application/x-www-form-urlencoded" },
        });
        data = response.data;
    } catch (error) {
        const responseBody = axios.isAxiosError(error)
            ? error.response?.data
            : undefined;
        if (isLastFmErrorBody(responseBody)) {
            throw lastFmApiError(serviceId, method, responseBody);
        }
        throw toScrobblerError(serviceId, method, error);
    }

    if (isLastFmErrorBody(data)) {
        throw lastFmApiError(serviceId, method, data);
    }
    return data;
}

export function createLastFmClient(): AxiosInstance {
    return axios.create({
        baseURL: LASTFM_API_URL,
        timeout: 10000,
        headers: {
            "User-Agent": BRAND_USER_AGENT,
        },
    });
}

function trackParams(track: Track): Record<string, string> {
    const params: Record<string, string> = {
        artist: track.artist,
        track: track.title,
    };
    if (track.album) {
        params.album = track.album;
    }
    if (track.durationSeconds) {
        params.duration = String(track.durationSeconds);
    }
    return params;
}

function ignoredScrobbleCount(data: unknown): number {
    if (typeof data !== "object" || data === null || !("scrobbles" in data)) {
        return 0;
    }
    const scrobbles = data.scrobbles;
    if (
        typeof scrobbles !== "object" ||
        scrobbles === null ||
        !("@attr" in scrobbles)
    ) {
        return 0;
    }
    const attr = scrobbles["@attr"];
    if (typeof attr !== "object" || attr === null || !("ignored" in attr)) {
        return 0;
    }
    const ignored = Number(attr.ignored);
    return Number.isFinite(ignored) ? ignored : 0;
}

/**
 * Last.fm account. Only one may be configured.
 */
export class LastFmScrobbler implements ScrobbleService {
    readonly id = "lastfm";
    readonly kind = "lastfm" as const;
    private readonly client: AxiosInstance;

    constructor(private readonly credentials: LastFmCredentials) {
        this.client = createLastFmClient();
    }

    private request(method: string, params: Record<string, string>): Promise<unknown> {
        return postLastFm(
            this.client,
            this.id,
            method,
            { ...params, sk: this.credentials.sessionKey },
            this.credentials
        );
    }

    async updateNowPlaying(track: Track): Promise<void> {
        await this.request("track.updateNowPlaying", trackParams(track));
        log.debug("Now playing updated");
    }

    async submitListen(track: Track, listenedAt: Date): Promise<void> {
        const data = await this.request("track.scrobble", {
            ...trackParams(track),
            timestamp: String(Math.floor(listenedAt.getTime() / 1000)),
        });

        const ignored = ignoredScrobbleCount(data);
        if (ignored > 0) {
            log.warn(`Last.fm ignored the scrobble for ${formatTrack(track)}`);
            return;
        }
        log.debug("Scrobbled successfully");
    }
}
