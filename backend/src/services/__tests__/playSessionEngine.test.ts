jest.mock("../../utils/logger", () => ({
    logger: {
        child: () => ({
            debug: jest.fn(),
            info: jest.fn(),
            warn: jest.fn(),
            error: jest.fn(),
        }),
    },
}));

import type { NowPlayingSnapshot } from "@nowscrobble/now-playing-contract";
import {
    PlaySessionEngine,
    elapsedSeconds,
    scrobbleThresholdSeconds,
} from "../playSessionEngine";
import { AppFilterStore, type AppFilterAction } from "../appFilter";
import { DEFAULT_CLEANUP_PATTERNS, TextCleaner } from "../../utils/textCleanup";

const T0 = new Date("2026-01-01T12:00:00.000Z");
const at = (seconds: number) => new Date(T0.getTime() + seconds * 1000);

const cleaner = new TextCleaner({
    enabled: true,
    patterns: [...DEFAULT_CLEANUP_PATTERNS],
});

function playing(overrides: Partial<NowPlayingSnapshot> = {}): NowPlayingSnapshot {
    return {
        title: "Song A",
        artist: "Artist A",
        album: "Album A",
        durationSeconds: 200,
        isPlaying: true,
        sourceAppId: "com.example.player",
        updateToken: "token-1",
        ...overrides,
    };
}

function buildEngine(options: { threshold?: number; action?: AppFilterAction } = {}) {
    const classify = jest.fn(
        (_appId: string | undefined): AppFilterAction => options.action ?? "allow"
    );
    const engine = new PlaySessionEngine({
        scrobbleThreshold: options.threshold ?? 50,
        cleaner,
        appFilter: { classify },
    });
    return { engine, classify };
}

describe("scrobble threshold helpers", () => {
    it("uses the percentage for short tracks and caps long tracks at 240s", () => {
        expect(scrobbleThresholdSeconds(200, 50)).toBe(100);
        expect(scrobbleThresholdSeconds(600, 80)).toBe(240);
        expect(scrobbleThresholdSeconds(45, 33)).toBe(14);
    });

    it("floors elapsed time and never goes negative", () => {
        expect(elapsedSeconds(T0, new Date(T0.getTime() + 99_999))).toBe(99);
        expect(elapsedSeconds(T0, at(-10))).toBe(0);
    });
});

describe("PlaySessionEngine", () => {
    it("rejects thresholds outside 1-100", () => {
        for (const threshold of [0, 101, 12.5]) {
            expect(
                () =>
                    new PlaySessionEngine({
                        scrobbleThreshold: threshold,
                        cleaner,
                        appFilter: { classify: () => "allow" },
                    })
            ).toThrow(`scrobbleThreshold must be between 1 and 100, got ${threshold}`);
        }
    });

    it("starts a session and emits now playing for a new track", () => {
        const { engine } = buildEngine();

        const result = engine.poll(playing({ title: "Song A [Explicit]" }), T0);

        expect(result).toEqual({
            nowPlaying: {
                kind: "now_playing",
                track: { title: "Song A", artist: "Artist A", album: "Album A", durationSeconds: 200 },
                sourceAppId: "com.example.player",
            },
        });
        expect(engine.state()).toBe("active_unscrobbled");
        expect(engine.currentSession()).toMatchObject({
            startedAt: T0,
            durationSeconds: 200,
            scrobbled: false,
            nowPlayingSent: true,
            updateToken: "token-1",
        });
    });

    it("scrobbles at 50% of a 200s track", () => {
        const { engine } = buildEngine({ threshold: 50 });
        engine.poll(playing(), T0);

        expect(engine.poll(playing(), at(99))).toEqual({});

        const result = engine.poll(playing(), at(100));
        expect(result.scrobble).toEqual({
            kind: "scrobble",
            track: { title: "Song A", artist: "Artist A", album: "Album A", durationSeconds: 200 },
            listenedAt: T0,
            sourceAppId: "com.example.player",
        });
        expect(engine.state()).toBe("active_scrobbled");
    });

    it("caps the wait at 240s for long tracks", () => {
        const { engine } = buildEngine({ threshold: 80 });
        engine.poll(playing({ durationSeconds: 600 }), T0);

        expect(engine.poll(playing({ durationSeconds: 600 }), at(239)).scrobble).toBeUndefined();
        expect(engine.poll(playing({ durationSeconds: 600 }), at(240)).scrobble).toBeDefined();
    });

    it("emits at most one scrobble per session", () => {
        const { engine } = buildEngine();
        engine.poll(playing(), T0);

        let scrobbles = 0;
        for (let second = 5; second <= 1000; second += 5) {
            if (engine.poll(playing(), at(second)).scrobble) {
                scrobbles += 1;
            }
        }

        expect(scrobbles).toBe(1);
    });

    it("never scrobbles tracks shorter than 30s", () => {
        const { engine } = buildEngine();
        engine.poll(playing({ durationSeconds: 20 }), T0);

        for (const second of [10, 20, 60, 3600]) {
            expect(engine.poll(playing({ durationSeconds: 20 }), at(second))).toEqual({});
        }
        expect(engine.state()).toBe("active_unscrobbled");
    });

    it("never scrobbles tracks with unknown duration", () => {
        const { engine } = buildEngine();
        engine.poll(playing({ durationSeconds: undefined }), T0);

        expect(engine.poll(playing({ durationSeconds: undefined }), at(3600))).toEqual({});
        expect(engine.currentSession()?.durationSeconds).toBe(0);
    });

    it("starts a fresh session when a different track plays", () => {
        const { engine } = buildEngine();
        engine.poll(playing(), T0);
        engine.poll(playing(), at(150));
        expect(engine.state()).toBe("active_scrobbled");

        const result = engine.poll(
            playing({ title: "Song B", updateToken: "token-2" }),
            at(155)
        );

        expect(result.nowPlaying?.track.title).toBe("Song B");
        expect(result.scrobble).toBeUndefined();
        expect(engine.state()).toBe("active_unscrobbled");
        expect(engine.currentSession()?.startedAt).toEqual(at(155));
    });

    it("treats a changed album as a different track", () => {
        const { engine } = buildEngine();
        engine.poll(playing(), T0);

        expect(engine.poll(playing({ album: "Album B" }), at(5)).nowPlaying).toBeDefined();
    });

    it("keeps the session when only the duration changes", () => {
        const { engine } = buildEngine();
        engine.poll(playing(), T0);

        expect(engine.poll(playing({ durationSeconds: 201 }), at(5))).toEqual({});
        expect(engine.currentSession()?.startedAt).toEqual(T0);
    });

    it("restarts the session when the update token changes for the same track", () => {
        const { engine } = buildEngine();
        engine.poll(playing(), T0);
        engine.poll(playing(), at(120));
        expect(engine.state()).toBe("active_scrobbled");

        const result = engine.poll(playing({ updateToken: "token-2" }), at(200));

        expect(result.nowPlaying?.track.title).toBe("Song A");
        expect(engine.state()).toBe("active_unscrobbled");
        expect(engine.poll(playing({ updateToken: "token-2" }), at(300)).scrobble).toBeDefined();
    });

    it("preserves the session while paused and resumes it afterwards", () => {
        const { engine } = buildEngine();
        engine.poll(playing(), T0);
        const before = engine.currentSession();

        expect(engine.poll(playing({ isPlaying: false }), at(30))).toEqual({});
        expect(engine.poll(playing({ isPlaying: undefined }), at(40))).toEqual({});
        expect(engine.currentSession()).toEqual(before);

        expect(engine.poll(playing(), at(60))).toEqual({});
        expect(engine.currentSession()?.startedAt).toEqual(T0);
        expect(engine.poll(playing(), at(100)).scrobble).toBeDefined();
    });

    it("does not start a session from a paused snapshot", () => {
        const { engine } = buildEngine();

        expect(engine.poll(playing({ isPlaying: false }), T0)).toEqual({});
        expect(engine.state()).toBe("empty");
    });

    it("destroys the session when the source reports nothing", () => {
        const { engine } = buildEngine();
        engine.poll(playing(), T0);

        expect(engine.poll(null, at(10))).toEqual({});
        expect(engine.state()).toBe("empty");

        expect(engine.poll(playing(), at(20)).nowPlaying).toBeDefined();
        expect(engine.currentSession()?.startedAt).toEqual(at(20));
    });

    it("ignores snapshots without a title or artist", () => {
        const { engine, classify } = buildEngine();
        engine.poll(playing(), T0);

        expect(engine.poll(playing({ artist: undefined }), at(150))).toEqual({});
        expect(engine.currentSession()?.scrobbled).toBe(false);
        expect(classify).toHaveBeenCalledTimes(1);
    });

    it("does nothing for ignored apps", () => {
        const { engine } = buildEngine({ action: "ignore" });

        expect(engine.poll(playing(), T0)).toEqual({});
        expect(engine.state()).toBe("empty");
    });

    it("asks about unknown apps without touching the session", () => {
        const { engine } = buildEngine({ action: "ask_user" });

        expect(engine.poll(playing(), T0)).toEqual({
            askUser: { appId: "com.example.player" },
        });
        expect(engine.state()).toBe("empty");
    });

    it("re-evaluates the same snapshot once the user allows the app", async () => {
        const store = new AppFilterStore({
            promptForNewApps: true,
            scrobbleUnknown: true,
            allowedApps: [],
            ignoredApps: [],
        });
        const engine = new PlaySessionEngine({
            scrobbleThreshold: 50,
            cleaner,
            appFilter: store,
        });

        expect(engine.poll(playing(), T0).askUser).toEqual({
            appId: "com.example.player",
        });
        await store.recordDecision("com.example.player", "allow");

        expect(engine.poll(playing(), at(5)).nowPlaying?.track.title).toBe("Song A");
    });
});
