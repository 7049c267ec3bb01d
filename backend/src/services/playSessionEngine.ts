import type { NowPlayingSnapshot } from "@nowscrobble/now-playing-contract";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import { formatTrack, sameTrack, trackFromSnapshot, type Track } from "../utils/track";
import type { TextCleaner } from "../utils/textCleanup";
import type { AppFilterAction } from "./appFilter";

/** Tracks shorter than this are never scrobbled. */
export const MIN_SCROBBLE_DURATION_SECONDS = 30;
/** Upper bound on how long any track must play before it is scrobbled. */
export const MAX_SCROBBLE_WAIT_SECONDS = 240;

export interface PlaySession {
    track: Track;
    sourceAppId?: string;
    /** Wall-clock time the session was created. */
    startedAt: Date;
    /** 0 when the source does not report a duration. */
    durationSeconds: number;
    scrobbled: boolean;
    nowPlayingSent: boolean;
    updateToken?: string;
}

export type SessionState = "empty" | "active_unscrobbled" | "active_scrobbled";

export interface NowPlayingEvent {
    kind: "now_playing";
    track: Track;
    sourceAppId?: string;
}

export interface ScrobbleEvent {
    kind: "scrobble";
    track: Track;
    /** When the listen began. */
    listenedAt: Date;
    sourceAppId?: string;
}

export type DeliveryEvent = NowPlayingEvent | ScrobbleEvent;

export interface AskUserEvent {
    appId: string;
}

export interface PollResult {
    nowPlaying?: NowPlayingEvent;
    scrobble?: ScrobbleEvent;
    askUser?: AskUserEvent;
}

export interface AppClassifier {
    classify(appId: string | undefined): AppFilterAction;
}

export interface PlaySessionEngineOptions {
    /** Percentage of the track (1-100) that must play before scrobbling. */
    scrobbleThreshold: number;
    cleaner: TextCleaner;
    appFilter: AppClassifier;
}

const log = logger.child("session");

/**
 * Seconds of play required before a track of `durationSeconds` is scrobbled.
 */
export function scrobbleThresholdSeconds(
    durationSeconds: number,
    thresholdPercent: number
): number {
    const byPercent = Math.floor((durationSeconds * thresholdPercent) / 100);
    return Math.min(byPercent, MAX_SCROBBLE_WAIT_SECONDS);
}

export function elapsedSeconds(startedAt: Date, now: Date): number {
    return Math.max(0, Math.floor((now.getTime() - startedAt.getTime()) / 1000));
}

/**
 * Turns successive now-playing snapshots into now-playing, scrobble and
 * ask-user events. Owns at most one PlaySession.
 */
export class PlaySessionEngine {
    private session: PlaySession | null = null;
    private readonly thresholdPercent: number;
    private readonly cleaner: TextCleaner;
    private readonly appFilter: AppClassifier;

    constructor(options: PlaySessionEngineOptions) {
        if (
            !Number.isInteger(options.scrobbleThreshold) ||
            options.scrobbleThreshold < 1 ||
            options.scrobbleThreshold > 100
        ) {
            throw new AppError(
                ErrorCode.INVALID_CONFIG,
                ErrorCategory.FATAL,
                `scrobbleThreshold must be between 1 and 100, got ${options.scrobbleThreshold}`
            );
        }
        this.thresholdPercent = options.scrobbleThreshold;
        this.cleaner = options.cleaner;
        this.appFilter = options.appFilter;
    }

    state(): SessionState {
        if (!this.session) {
            return "empty";
        }
        return this.session.scrobbled ? "active_scrobbled" : "active_unscrobbled";
    }

    /** Copy of the current session, or null. */
    currentSession(): Readonly<PlaySession> | null {
        return this.session ? { ...this.session } : null;
    }

    /**
     * Evaluate one snapshot. `null` means the media source reported nothing
     * at all and ends the session; a paused snapshot leaves it untouched.
     */
    poll(snapshot: NowPlayingSnapshot | null, now: Date): PollResult {
        if (snapshot === null) {
            if (this.session) {
                log.info("Media stopped, clearing session");
                this.session = null;
            }
            return {};
        }

        if (snapshot.isPlaying !== true) {
            return {};
        }

        const track = trackFromSnapshot(snapshot, this.cleaner);
        if (!track) {
            return {};
        }

        const sourceAppId = snapshot.sourceAppId;
        const action = this.appFilter.classify(sourceAppId);
        if (action === "ignore") {
            log.debug(`Ignoring playback from ${sourceAppId ?? "unknown app"}`);
            return {};
        }
        if (action === "ask_user") {
            return sourceAppId ? { askUser: { appId: sourceAppId } } : {};
        }

        if (this.isNewSession(track, snapshot.updateToken)) {
            return this.startSession(track, sourceAppId, snapshot.updateToken, now);
        }

        return this.continueSession(now);
    }

    private isNewSession(track: Track, updateToken: string | undefined): boolean {
        if (!this.session) {
            return true;
        }
        return (
            !sameTrack(this.session.track, track) ||
            this.session.updateToken !== updateToken
        );
    }

    private startSession(
        track: Track,
        sourceAppId: string | undefined,
        updateToken: string | undefined,
        now: Date
    ): PollResult {
        const durationSeconds = track.durationSeconds ?? 0;
        log.info(
            `New track: ${formatTrack(track)} (${durationSeconds}s) from ${sourceAppId ?? "unknown app"}`
        );

        this.session = {
            track,
            sourceAppId,
            startedAt: now,
            durationSeconds,
            scrobbled: false,
            nowPlayingSent: true,
            updateToken,
        };

        return { nowPlaying: { kind: "now_playing", track, sourceAppId } };
    }

    private continueSession(now: Date): PollResult {
        const session = this.session;
        if (!session) {
            return {};
        }

        if (this.shouldScrobble(session, now)) {
            log.info(
                `Scrobbling: ${formatTrack(session.track)} (played ${elapsedSeconds(session.startedAt, now)}s / ${session.durationSeconds}s)`
            );
            session.scrobbled = true;
            return {
                scrobble: {
                    kind: "scrobble",
                    track: session.track,
                    listenedAt: session.startedAt,
                    sourceAppId: session.sourceAppId,
                },
            };
        }

        if (!session.nowPlayingSent) {
            session.nowPlayingSent = true;
            return {
                nowPlaying: {
                    kind: "now_playing",
                    track: session.track,
                    sourceAppId: session.sourceAppId,
                },
            };
        }

        return {};
    }

    private shouldScrobble(session: PlaySession, now: Date): boolean {
        if (session.scrobbled) {
            return false;
        }
        if (session.durationSeconds < MIN_SCROBBLE_DURATION_SECONDS) {
            return false;
        }
        return (
            elapsedSeconds(session.startedAt, now) >=
            scrobbleThresholdSeconds(session.durationSeconds, this.thresholdPercent)
        );
    }
}
