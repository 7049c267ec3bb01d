import { logger } from "../utils/logger";
import { formatTrack, type Track } from "../utils/track";

export interface StatusSink {
    nowPlaying(track: Track | null): void;
    scrobbled(track: Track): void;
    setPaused(paused: boolean): void;
}

export interface ScrobbleStatus {
    nowPlaying: string | null;
    lastScrobbled: string | null;
    paused: boolean;
}

const log = logger.child("status");

/** Latest "Artist - Title" lines, for whatever renders status to the user. */
export class ScrobbleStatusStore implements StatusSink {
    private status: ScrobbleStatus = {
        nowPlaying: null,
        lastScrobbled: null,
        paused: false,
    };

    nowPlaying(track: Track | null): void {
        const text = track ? formatTrack(track) : null;
        if (text === this.status.nowPlaying) {
            return;
        }
        this.status = { ...this.status, nowPlaying: text };
        log.info(text ? `Now playing: ${text}` : "Nothing playing");
    }

    scrobbled(track: Track): void {
        const text = formatTrack(track);
        this.status = { ...this.status, lastScrobbled: text };
        log.info(`Scrobbled: ${text}`);
    }

    setPaused(paused: boolean): void {
        if (paused === this.status.paused) {
            return;
        }
        this.status = { ...this.status, paused };
        log.info(paused ? "Playback paused" : "Playback resumed");
    }

    snapshot(): Readonly<ScrobbleStatus> {
        return { ...this.status };
    }
}
