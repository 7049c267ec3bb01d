const mockInfo = jest.fn();
jest.mock("../../utils/logger", () => {
    const scoped = {
        debug: jest.fn(),
        info: (...args: unknown[]) => mockInfo(...args),
        warn: jest.fn(),
        error: jest.fn(),
        child: jest.fn(),
    };
    scoped.child.mockReturnValue(scoped);
    return { logger: scoped };
});

import { ScrobbleStatusStore } from "../scrobbleStatus";

const track = { title: "Song", artist: "Band" };

describe("ScrobbleStatusStore", () => {
    beforeEach(() => {
        mockInfo.mockClear();
    });

    it("starts empty", () => {
        expect(new ScrobbleStatusStore().snapshot()).toEqual({
            nowPlaying: null,
            lastScrobbled: null,
            paused: false,
        });
    });

    it("records now playing and scrobbled tracks as text", () => {
        const store = new ScrobbleStatusStore();

        store.nowPlaying(track);
        store.scrobbled(track);

        expect(store.snapshot()).toEqual({
            nowPlaying: "Band - Song",
            lastScrobbled: "Band - Song",
            paused: false,
        });
        expect(mockInfo.mock.calls).toEqual([
            ["Now playing: Band - Song"],
            ["Scrobbled: Band - Song"],
        ]);
    });

    it("logs now-playing changes only", () => {
        const store = new ScrobbleStatusStore();

        store.nowPlaying(track);
        store.nowPlaying(track);
        store.nowPlaying(null);
        store.nowPlaying(null);

        expect(mockInfo.mock.calls).toEqual([["Now playing: Band - Song"], ["Nothing playing"]]);
        expect(store.snapshot().nowPlaying).toBeNull();
    });

    it("keeps now playing while paused and logs pause changes only", () => {
        const store = new ScrobbleStatusStore();
        store.nowPlaying(track);
        mockInfo.mockClear();

        store.setPaused(true);
        store.setPaused(true);
        expect(store.snapshot()).toEqual({
            nowPlaying: "Band - Song",
            lastScrobbled: null,
            paused: true,
        });

        store.setPaused(false);
        store.setPaused(false);
        expect(store.snapshot().paused).toBe(false);
        expect(mockInfo.mock.calls).toEqual([["Playback paused"], ["Playback resumed"]]);
    });

    it("returns copies of its state", () => {
        const store = new ScrobbleStatusStore();
        const before = store.snapshot();

        store.nowPlaying(track);

        expect(before.nowPlaying).toBeNull();
    });
});
