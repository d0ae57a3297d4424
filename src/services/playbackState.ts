import type { CatalogueReader } from "./catalogue";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const LOOP_MODES = ["off", "repeat-track", "repeat-all"] as const;
export type LoopMode = (typeof LOOP_MODES)[number];

export type ConnectionState = "idle" | "streaming" | "reconnecting" | "stopped";

/**
 * Live playback position. Owned by the StreamEngine; everything else sees
 * copies.
 */
export interface PlaybackState {
    performerId: string;
    trackNumber: number;
    /** Seconds into the active track; reset to 0 on every track change. */
    elapsedSeconds: number;
    loopMode: LoopMode;
    paused: boolean;
    /** Date.now() of the last write. */
    lastUpdatedAt: number;
}

/** Read-only view published to the control surface and status consumers. */
export interface PlaybackSnapshot {
    performerId: string;
    trackNumber: number;
    elapsedSeconds: number;
    durationSeconds: number | null;
    loopMode: LoopMode;
    connectionState: ConnectionState;
    paused: boolean;
    holding: boolean;
    updatedAt: string;
}

/** Position recovered from a durable snapshot, before catalogue checks. */
export interface RestoredPlayback {
    performerId: string;
    trackNumber: number;
    elapsedSeconds: number;
    loopMode: LoopMode;
    savedAt: string;
}

export type AdvanceReason = "natural" | "skip";

export type AdvanceDecision =
    | { kind: "play"; trackNumber: number }
    | { kind: "hold" };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isLoopMode(value: unknown): value is LoopMode {
    return LOOP_MODES.some((mode) => mode === value);
}

export function copyPlaybackState(state: PlaybackState): PlaybackState {
    return { ...state };
}

/**
 * Picks the track that follows `current` in `tracks` (ascending).
 *
 * - natural + repeat-track: same track again
 * - natural + off: next track, or hold once the last one has played
 * - natural + repeat-all: next track, wrapping to the first
 * - skip: next track, wrapping to the first, in every mode
 */
export function selectNextTrack(
    tracks: readonly number[],
    current: number,
    loopMode: LoopMode,
    reason: AdvanceReason
): AdvanceDecision {
    if (tracks.length === 0) {
        return { kind: "hold" };
    }

    if (reason === "natural" && loopMode === "repeat-track" && tracks.includes(current)) {
        return { kind: "play", trackNumber: current };
    }

    const next = tracks.find((trackNumber) => trackNumber > current);
    if (next !== undefined) {
        return { kind: "play", trackNumber: next };
    }

    if (reason === "natural" && loopMode === "off") {
        return { kind: "hold" };
    }

    return { kind: "play", trackNumber: tracks[0] };
}

export interface RestoreDefaults {
    performerId?: string;
    loopMode: LoopMode;
}

/**
 * Builds the start-up state from a snapshot (or nothing), falling back to
 * the configured performer and the performer's first track wherever the
 * snapshot no longer matches the catalogue on disk.
 */
export function restorePlaybackState(
    restored: RestoredPlayback | null,
    catalogue: CatalogueReader,
    defaults: RestoreDefaults,
    now: number = Date.now()
): PlaybackState {
    const performers = catalogue.listPerformers();
    if (performers.length === 0) {
        throw new Error("Cannot restore playback without any performer in the catalogue");
    }

    const fallbackPerformer =
        defaults.performerId && catalogue.hasPerformer(defaults.performerId)
            ? defaults.performerId
            : performers[0];

    const performerId =
        restored && catalogue.hasPerformer(restored.performerId)
            ? restored.performerId
            : fallbackPerformer;

    const keepTrack =
        restored !== null && catalogue.hasTrack(performerId, restored.trackNumber);
    const trackNumber = keepTrack
        ? restored.trackNumber
        : catalogue.tracksFor(performerId)[0];

    // An offset only means something for the recording it was taken from.
    const keepOffset =
        keepTrack &&
        restored.performerId === performerId &&
        Number.isFinite(restored.elapsedSeconds);
    const elapsedSeconds = keepOffset ? Math.max(0, restored.elapsedSeconds) : 0;

    return {
        performerId,
        trackNumber,
        elapsedSeconds,
        loopMode: restored?.loopMode ?? defaults.loopMode,
        paused: false,
        lastUpdatedAt: now,
    };
}
