import axios, { AxiosInstance } from "axios";
import { BRAND_NAME, BRAND_USER_AGENT, BRAND_VERSION } from "../config/brand";
import { logger, type Logger } from "../utils/logger";
import type { Track } from "../utils/track";
import { toScrobblerError, type ScrobbleService } from "./scrobblers";

export type ListenType = "playing_now" | "single";

export interface ListenBrainzTrackMetadata {
    artist_name: string;
    track_name: string;
    release_name?: string;
    additional_info: {
        submission_client: string;
        submission_client_version: string;
        duration_ms?: number;
    };
}

export interface ListenBrainzSubmission {
    listen_type: ListenType;
    payload: Array<{
        listened_at?: number;
        track_metadata: ListenBrainzTrackMetadata;
    }>;
}

export interface ListenBrainzOptions {
    name: string;
    token: string;
    apiUrl: string;
}

export function buildListenSubmission(
    listenType: ListenType,
    track: Track,
    listenedAt?: Date
): ListenBrainzSubmission {
    const trackMetadata: ListenBrainzTrackMetadata = {
        artist_name: track.artist,
        track_name: track.title,
        additional_info: {
            submission_client: BRAND_NAME,
            submission_client_version: BRAND_VERSION,
        },
    };
    if (track.album) {
        trackMetadata.release_name = track.album;
    }
    if (track.durationSeconds) {
        trackMetadata.additional_info.duration_ms = track.durationSeconds * 1000;
    }

    // playing_now listens must not carry a timestamp
    const listen =
        listenType === "single" && listenedAt
            ? {
                  listened_at: Math.floor(listenedAt.getTime() / 1000),
                  track_metadata: trackMetadata,
              }
            : { track_metadata: trackMetadata };

    return { listen_type: listenType, payload: [listen] };
}

/**
 * One ListenBrainz-compatible account. Several may be configured, e.g. the
 * public instance plus a self-hosted one.
 */
export class ListenBrainzScrobbler implements ScrobbleService {
    readonly id: string;
    readonly kind = "listenbrainz" as const;
    private readonly client: AxiosInstance;
    private readonly log: Logger;

    constructor(options: ListenBrainzOptions) {
        this.id = `listenbrainz:${options.name}`;
        this.log = logger.child(this.id);
        this.client = axios.create({
            baseURL: options.apiUrl.replace(/\/+$/, ""),
            timeout: 10000,
            headers: {
                Authorization: `Token ${options.token}`,
                "User-Agent": BRAND_USER_AGENT,
            },
        });
    }

    private async submit(operation: string, body: ListenBrainzSubmission): Promise<void> {
        try {
            await this.client.post("/1/submit-listens", body);
        } catch (error) {
            throw toScrobblerError(this.id, operation, error);
        }
    }

    async updateNowPlaying(track: Track): Promise<void> {
        await this.submit("playing_now", buildListenSubmission("playing_now", track));
        this.log.debug("Now playing updated");
    }

    async submitListen(track: Track, listenedAt: Date): Promise<void> {
        await this.submit("submit-listens", buildListenSubmission("single", track, listenedAt));
        this.log.debug("Listen submitted");
    }
}
