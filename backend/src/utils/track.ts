import {
    hasTrackIdentity,
    type NowPlayingSnapshot,
} from "@nowscrobble/now-playing-contract";
import type { TextCleaner } from "./textCleanup";

export interface Track {
    readonly title: string;
    readonly artist: string;
    readonly album?: string;
    /** Whole seconds; absent when the source does not report a duration. */
    readonly durationSeconds?: number;
}

/**
 * Track identity is title + artist + album. Duration is ignored: sources
 * often refine it while the same track keeps playing.
 */
export function sameTrack(a: Track, b: Track): boolean {
    return a.title === b.title && a.artist === b.artist && a.album === b.album;
}

export function formatTrack(track: Track): string {
    return `${track.artist} - ${track.title}`;
}

/**
 * Build a cleaned, frozen Track from a snapshot. Returns null when the
 * snapshot lacks a title or artist.
 */
export function trackFromSnapshot(
    snapshot: NowPlayingSnapshot,
    cleaner: TextCleaner
): Track | null {
    if (!hasTrackIdentity(snapshot)) {
        return null;
    }

    const durationSeconds =
        snapshot.durationSeconds !== undefined
            ? Math.trunc(snapshot.durationSeconds)
            : undefined;

    return Object.freeze({
        title: cleaner.clean(snapshot.title),
        artist: cleaner.clean(snapshot.artist),
        album: cleaner.cleanOptional(snapshot.album),
        durationSeconds,
    });
}
