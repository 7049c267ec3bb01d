export const NOW_PLAYING_CONTRACT_VERSION = "1.0.0";

/**
 * One reading of the system's "now playing" state. Every field is optional:
 * producers report what the media endpoint exposes and nothing more.
 */
export interface NowPlayingSnapshot {
    title?: string;
    artist?: string;
    album?: string;
    durationSeconds?: number;
    isPlaying?: boolean;
    /** Identifier of the application that owns the media session (bundle id). */
    sourceAppId?: string;
    /** Opaque value that changes whenever the producer refreshes its info. */
    updateToken?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

const normalizeString = (value: unknown): string | undefined => {
    if (typeof value !== "string") {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
};

const normalizePositiveFiniteNumber = (value: unknown): number | undefined => {
    if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
        return undefined;
    }
    return value;
};

const normalizeBoolean = (value: unknown): boolean | undefined =>
    typeof value === "boolean" ? value : undefined;

const normalizeToken = (value: unknown): string | undefined => {
    if (typeof value === "number" && Number.isFinite(value)) {
        return String(value);
    }
    return normalizeString(value);
};

/**
 * Parses a producer payload.
 *
 * Returns `null` when the producer reports that nothing is playing, and
 * `undefined` when the payload is not a snapshot at all.
 */
export const parseNowPlayingSnapshot = (
    raw: unknown,
): NowPlayingSnapshot | null | undefined => {
    if (raw === null) {
        return null;
    }
    if (!isRecord(raw)) {
        return undefined;
    }

    const snapshot: NowPlayingSnapshot = {
        title: normalizeString(raw.title),
        artist: normalizeString(raw.artist),
        album: normalizeString(raw.album),
        durationSeconds: normalizePositiveFiniteNumber(
            raw.durationSeconds ?? raw.duration,
        ),
        isPlaying: normalizeBoolean(raw.isPlaying ?? raw.playing),
        sourceAppId: normalizeString(raw.sourceAppId ?? raw.bundleIdentifier),
        updateToken: normalizeToken(raw.updateToken ?? raw.timestamp),
    };

    return snapshot;
};

export const hasTrackIdentity = (
    snapshot: NowPlayingSnapshot,
): snapshot is NowPlayingSnapshot & { title: string; artist: string } =>
    Boolean(snapshot.title) && Boolean(snapshot.artist);
