import { Catalogue } from "../catalogue";
import {
    isLoopMode,
    restorePlaybackState,
    selectNextTrack,
    type RestoredPlayback,
} from "../playbackState";

describe("selectNextTrack", () => {
    const tracks = [1, 2, 3, 5];

    it("repeats the current track on natural completion under repeat-track", () => {
        expect(selectNextTrack(tracks, 3, "repeat-track", "natural")).toEqual({
            kind: "play",
            trackNumber: 3,
        });
    });

    it("steps over gaps in the track list", () => {
        expect(selectNextTrack(tracks, 3, "repeat-all", "natural")).toEqual({
            kind: "play",
            trackNumber: 5,
        });
    });

    it("wraps under repeat-all", () => {
        expect(selectNextTrack(tracks, 5, "repeat-all", "natural")).toEqual({
            kind: "play",
            trackNumber: 1,
        });
    });

    it("holds after the last track under off", () => {
        expect(selectNextTrack(tracks, 5, "off", "natural")).toEqual({ kind: "hold" });
        expect(selectNextTrack(tracks, 2, "off", "natural")).toEqual({
            kind: "play",
            trackNumber: 3,
        });
    });

    it.each(["off", "repeat-track", "repeat-all"] as const)(
        "skip under %s moves to the next track and wraps",
        (mode) => {
            expect(selectNextTrack(tracks, 2, mode, "skip")).toEqual({ kind: "play", trackNumber: 3 });
            expect(selectNextTrack(tracks, 5, mode, "skip")).toEqual({ kind: "play", trackNumber: 1 });
        }
    );

    it("holds when there are no tracks", () => {
        expect(selectNextTrack([], 1, "repeat-all", "skip")).toEqual({ kind: "hold" });
    });
});

describe("isLoopMode", () => {
    it("accepts the three modes only", () => {
        expect(isLoopMode("off")).toBe(true);
        expect(isLoopMode("repeat-track")).toBe(true);
        expect(isLoopMode("repeat-all")).toBe(true);
        expect(isLoopMode("shuffle")).toBe(false);
        expect(isLoopMode(undefined)).toBe(false);
    });
});

describe("restorePlaybackState", () => {
    const catalogue = Catalogue.fromEntries(
        {
            alpha: { 1: "/a/001.mp3", 2: "/a/002.mp3", 3: "/a/003.mp3" },
            beta: { 2: "/b/002.mp3", 4: "/b/004.mp3" },
        },
        4
    );
    const now = 1_700_000_000_000;

    const snapshot = (overrides: Partial<RestoredPlayback> = {}): RestoredPlayback => ({
        performerId: "alpha",
        trackNumber: 2,
        elapsedSeconds: 42.5,
        loopMode: "off",
        savedAt: "2024-01-01T00:00:00.000Z",
        ...overrides,
    });

    it("starts from the defaults without a snapshot", () => {
        expect(
            restorePlaybackState(null, catalogue, { performerId: "beta", loopMode: "repeat-all" }, now)
        ).toEqual({
            performerId: "beta",
            trackNumber: 2,
            elapsedSeconds: 0,
            loopMode: "repeat-all",
            paused: false,
            lastUpdatedAt: now,
        });
    });

    it("uses the first performer when the default is unknown", () => {
        const state = restorePlaybackState(null, catalogue, { performerId: "gamma", loopMode: "off" }, now);
        expect(state.performerId).toBe("alpha");
        expect(state.trackNumber).toBe(1);
    });

    it("keeps a valid snapshot as saved", () => {
        expect(restorePlaybackState(snapshot(), catalogue, { loopMode: "repeat-all" }, now)).toEqual({
            performerId: "alpha",
            trackNumber: 2,
            elapsedSeconds: 42.5,
            loopMode: "off",
            paused: false,
            lastUpdatedAt: now,
        });
    });

    it("restarts from the first track when the saved track is missing", () => {
        const state = restorePlaybackState(
            snapshot({ performerId: "beta", trackNumber: 3 }),
            catalogue,
            { loopMode: "repeat-all" },
            now
        );
        expect(state).toMatchObject({ performerId: "beta", trackNumber: 2, elapsedSeconds: 0 });
    });

    it("keeps the track but drops the offset when the performer is gone", () => {
        const state = restorePlaybackState(
            snapshot({ performerId: "gamma", trackNumber: 4, elapsedSeconds: 10 }),
            catalogue,
            { performerId: "beta", loopMode: "repeat-all" },
            now
        );
        expect(state).toMatchObject({
            performerId: "beta",
            trackNumber: 4,
            elapsedSeconds: 0,
            loopMode: "off",
        });
    });
});
