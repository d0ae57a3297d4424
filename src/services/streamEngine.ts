import PQueue from "p-queue";
import { createLogger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode, isAppError } from "../utils/errors";
import { computeBackoffDelay, sleep } from "../utils/async";
import { isTrackNumberInRange, type CatalogueReader } from "./catalogue";
import type { DurationResolver } from "./durationIndex";
import type { SnapshotWriter } from "./persistenceStore";
import type { AudioSource, AudioSourceFactory, OutputSink, SinkConnection } from "./outputSink";
import {
    copyPlaybackState,
    isLoopMode,
    selectNextTrack,
    type ConnectionState,
    type LoopMode,
    type PlaybackSnapshot,
    type PlaybackState,
} from "./playbackState";

const log = createLogger("StreamEngine");

const DEFAULT_TICK_INTERVAL_MS = 1_000;
const DEFAULT_AUTOSAVE_INTERVAL_MS = 30_000;
const DEFAULT_RECONNECT_BASE_DELAY_MS = 10_000;
const DEFAULT_RECONNECT_MAX_DELAY_MS = 60_000;
const DEFAULT_SOURCE_FAILURE_DELAY_MS = 1_000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** "queued": accepted while the sink is down, applied once streaming resumes. */
export type CommandOutcome = "applied" | "queued";

/** Command and state surface consumed by the control API. */
export interface PlaybackController {
    getState(): PlaybackSnapshot;
    jumpTo(trackNumber: number): Promise<CommandOutcome>;
    switchPerformer(performerId: string): Promise<CommandOutcome>;
    setLoopMode(mode: LoopMode): Promise<CommandOutcome>;
    skip(): Promise<CommandOutcome>;
    pause(): Promise<CommandOutcome>;
    resume(): Promise<CommandOutcome>;
}

export interface LockHandle {
    release(): Promise<void>;
}

export type StateListener = (snapshot: PlaybackSnapshot) => void;

export interface StreamEngineOptions {
    catalogue: CatalogueReader;
    durations: DurationResolver;
    persistence: SnapshotWriter;
    sink: OutputSink;
    sources: AudioSourceFactory;
    initialState: PlaybackState;
    /** Released as the last shutdown step. */
    lock?: LockHandle | null;
    tickIntervalMs?: number;
    autosaveIntervalMs?: number;
    reconnectBaseDelayMs?: number;
    reconnectMaxDelayMs?: number;
    sourceFailureDelayMs?: number;
    now?: () => number;
}

interface Mutation {
    label: string;
    /** Changes `state`; returns true when the source has to be reopened. */
    apply(): boolean;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

function invalidTrack(performerId: string, trackNumber: number, trackCount: number): AppError {
    return new AppError(
        ErrorCode.INVALID_TRACK,
        ErrorCategory.RECOVERABLE,
        `Track ${trackNumber} is not available for ${performerId}`,
        { performerId, trackNumber, trackCount }
    );
}

function invalidPerformer(performerId: string): AppError {
    return new AppError(
        ErrorCode.INVALID_PERFORMER,
        ErrorCategory.RECOVERABLE,
        `Unknown performer: ${performerId}`,
        { performerId }
    );
}

function engineStopped(): AppError {
    return new AppError(
        ErrorCode.ENGINE_STOPPED,
        ErrorCategory.TRANSIENT,
        "Playback engine is shutting down"
    );
}

// ---------------------------------------------------------------------------
// StreamEngine
// ---------------------------------------------------------------------------

/**
 * Drives one output sink around the clock.
 *
 * Every mutation of the playback state (commands, ticks, track ends, sink
 * failures, reconnects) runs on a single serial queue, so the state needs no
 * locking. The reconnect loop and the timers only enqueue work.
 *
 * States: idle → streaming ⇄ reconnecting → stopped.
 */
export class StreamEngine implements PlaybackController {
    private readonly catalogue: CatalogueReader;
    private readonly durations: DurationResolver;
    private readonly persistence: SnapshotWriter;
    private readonly sink: OutputSink;
    private readonly sources: AudioSourceFactory;
    private readonly lock: LockHandle | null;
    private readonly tickIntervalMs: number;
    private readonly autosaveIntervalMs: number;
    private readonly reconnectBaseDelayMs: number;
    private readonly reconnectMaxDelayMs: number;
    private readonly sourceFailureDelayMs: number;
    private readonly now: () => number;

    private readonly state: PlaybackState;
    private connectionState: ConnectionState = "idle";
    private connection: SinkConnection | null = null;
    private source: AudioSource | null = null;
    /** Bumped on every source teardown; stale source callbacks compare against it. */
    private sourceGeneration = 0;
    /** Offset the current source was opened at. */
    private sourceOffset = 0;
    private durationSeconds: number | null = null;
    /** Final track finished under loop mode "off". */
    private holding = false;
    private started = false;
    private stopping = false;
    private tickPending = false;

    private readonly commands = new PQueue({ concurrency: 1 });
    // Snapshot writes land in the order their copies were taken.
    private readonly saves = new PQueue({ concurrency: 1 });
    private readonly deferred: Mutation[] = [];
    private readonly listeners = new Set<StateListener>();
    private readonly pendingTimers = new Set<NodeJS.Timeout>();
    private tickTimer: NodeJS.Timeout | null = null;
    private autosaveTimer: NodeJS.Timeout | null = null;
    private reconnectAbort: AbortController | null = null;
    private reconnectTask: Promise<void> | null = null;
    private shutdownTask: Promise<void> | null = null;

    constructor(options: StreamEngineOptions) {
        this.catalogue = options.catalogue;
        this.durations = options.durations;
        this.persistence = options.persistence;
        this.sink = options.sink;
        this.sources = options.sources;
        this.lock = options.lock ?? null;
        this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
        this.autosaveIntervalMs = options.autosaveIntervalMs ?? DEFAULT_AUTOSAVE_INTERVAL_MS;
        this.reconnectBaseDelayMs = options.reconnectBaseDelayMs ?? DEFAULT_RECONNECT_BASE_DELAY_MS;
        this.reconnectMaxDelayMs = options.reconnectMaxDelayMs ?? DEFAULT_RECONNECT_MAX_DELAY_MS;
        this.sourceFailureDelayMs = options.sourceFailureDelayMs ?? DEFAULT_SOURCE_FAILURE_DELAY_MS;
        this.now = options.now ?? Date.now;

        const initial = options.initialState;
        if (!this.catalogue.hasTrack(initial.performerId, initial.trackNumber)) {
            throw invalidTrack(initial.performerId, initial.trackNumber, this.catalogue.trackCount);
        }
        this.state = copyPlaybackState(initial);
    }

    // -----------------------------------------------------------------------
    // Lifecycle
    // -----------------------------------------------------------------------

    /**
     * Starts the timers and connects to the sink. Resolves once the first
     * connection attempt has either started streaming or handed over to the
     * reconnect loop; it never rejects for sink trouble.
     */
    async start(): Promise<void> {
        if (this.started) return;
        this.started = true;

        log.info("Starting playback", {
            sink: this.sink.description,
            performerId: this.state.performerId,
            trackNumber: this.state.trackNumber,
            elapsedSeconds: this.state.elapsedSeconds,
            loopMode: this.state.loopMode,
        });

        this.tickTimer = setInterval(() => this.scheduleTick(), this.tickIntervalMs);
        this.autosaveTimer = setInterval(() => {
            void this.saveSnapshot();
        }, this.autosaveIntervalMs);

        await this.run(() => this.establishConnection());
    }

    /**
     * Stops reconnecting, closes sink and source, saves a final snapshot and
     * releases the instance lock, in that order. A failing step is logged
     * and the remaining steps still run.
     */
    shutdown(): Promise<void> {
        if (!this.shutdownTask) {
            this.shutdownTask = this.performShutdown();
        }
        return this.shutdownTask;
    }

    /** Resolves once every queued mutation has been applied. */
    settle(): Promise<void> {
        return this.commands.onIdle();
    }

    onState(listener: StateListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    getState(): PlaybackSnapshot {
        return {
            performerId: this.state.performerId,
            trackNumber: this.state.trackNumber,
            elapsedSeconds: this.liveElapsed(),
            durationSeconds: this.durationSeconds,
            loopMode: this.state.loopMode,
            connectionState: this.connectionState,
            paused: this.state.paused,
            holding: this.holding,
            updatedAt: new Date(this.state.lastUpdatedAt).toISOString(),
        };
    }

    /** Hands a copy of the current position to the persistence store. */
    async saveSnapshot(): Promise<void> {
        const snapshot = await this.run(async () => {
            this.captureElapsed();
            return copyPlaybackState(this.state);
        });

        try {
            await this.writeSnapshot(snapshot);
        } catch (error) {
            log.error("Autosave failed", error);
        }
    }

    // -----------------------------------------------------------------------
    // Commands
    // -----------------------------------------------------------------------

    jumpTo(trackNumber: number): Promise<CommandOutcome> {
        // Checked against the performer again once the command is applied.
        if (!isTrackNumberInRange(trackNumber, this.catalogue.trackCount)) {
            return Promise.reject(
                invalidTrack(this.state.performerId, trackNumber, this.catalogue.trackCount)
            );
        }
        return this.submit({
            label: `jump to track ${trackNumber}`,
            apply: () => {
                this.assertTrack(this.state.performerId, trackNumber);
                this.setTrack(trackNumber);
                return true;
            },
        });
    }

    switchPerformer(performerId: string): Promise<CommandOutcome> {
        if (!this.catalogue.hasPerformer(performerId)) {
            return Promise.reject(invalidPerformer(performerId));
        }
        return this.submit({
            label: `switch performer to ${performerId}`,
            apply: () => {
                const current = this.state.trackNumber;
                const trackNumber = this.catalogue.hasTrack(performerId, current)
                    ? current
                    : this.catalogue.tracksFor(performerId)[0];
                this.state.performerId = performerId;
                this.setTrack(trackNumber);
                return true;
            },
        });
    }

    /** Takes effect at the next natural track completion. */
    setLoopMode(mode: LoopMode): Promise<CommandOutcome> {
        if (!isLoopMode(mode)) {
            return Promise.reject(
                new AppError(
                    ErrorCode.INVALID_LOOP_MODE,
                    ErrorCategory.RECOVERABLE,
                    `Unknown loop mode: ${String(mode)}`
                )
            );
        }
        return this.run(async (): Promise<CommandOutcome> => {
            this.assertRunning();
            if (this.state.loopMode !== mode) {
                log.info(`Loop mode ${this.state.loopMode} → ${mode}`);
                this.state.loopMode = mode;
                this.state.lastUpdatedAt = this.now();
                this.publish();
            }
            return "applied";
        });
    }

    skip(): Promise<CommandOutcome> {
        return this.submit({
            label: "skip",
            apply: () => {
                const decision = selectNextTrack(
                    this.catalogue.tracksFor(this.state.performerId),
                    this.state.trackNumber,
                    this.state.loopMode,
                    "skip"
                );
                if (decision.kind === "hold") return false;
                this.setTrack(decision.trackNumber);
                return true;
            },
        });
    }

    pause(): Promise<CommandOutcome> {
        return this.submit({
            label: "pause",
            apply: () => {
                if (!this.state.paused) {
                    this.captureElapsed();
                    this.state.paused = true;
                    this.state.lastUpdatedAt = this.now();
                }
                return false;
            },
        });
    }

    resume(): Promise<CommandOutcome> {
        return this.submit({
            label: "resume",
            apply: () => {
                if (this.state.paused) {
                    this.state.paused = false;
                    this.state.lastUpdatedAt = this.now();
                }
                return false;
            },
        });
    }

    // -----------------------------------------------------------------------
    // Command sequencing
    // -----------------------------------------------------------------------

    private run<T>(task: () => Promise<T>): Promise<T> {
        return this.commands.add(task);
    }

    private enqueue(label: string, task: () => Promise<void>): void {
        this.run(task).catch((error: unknown) => {
            log.error(`${label} failed`, error);
        });
    }

    private submit(mutation: Mutation): Promise<CommandOutcome> {
        if (this.stopping) {
            return Promise.reject(engineStopped());
        }

        return this.run(async (): Promise<CommandOutcome> => {
            this.assertRunning();

            if (this.connectionState !== "streaming") {
                this.deferred.push(mutation);
                log.info(`Queued ${mutation.label} until the sink is back`, {
                    connectionState: this.connectionState,
                    queued: this.deferred.length,
                });
                return "queued";
            }

            const reopen = mutation.apply();
            if (reopen) {
                await this.openCurrentSource();
            }
            this.syncPause();
            this.publish();
            log.info(`Applied ${mutation.label}`, {
                performerId: this.state.performerId,
                trackNumber: this.state.trackNumber,
            });
            return "applied";
        });
    }

    private assertRunning(): void {
        if (this.stopping || this.connectionState === "stopped") {
            throw engineStopped();
        }
    }

    private assertTrack(performerId: string, trackNumber: number): void {
        if (!this.catalogue.hasTrack(performerId, trackNumber)) {
            throw invalidTrack(performerId, trackNumber, this.catalogue.trackCount);
        }
    }

    private scheduleTick(): void {
        if (this.tickPending) return;
        this.tickPending = true;
        this.enqueue("tick", async () => {
            try {
                await this.onTick();
            } finally {
                this.tickPending = false;
            }
        });
    }

    private schedule(delayMs: number, label: string, task: () => Promise<void>): void {
        const timer = setTimeout(() => {
            this.pendingTimers.delete(timer);
            this.enqueue(label, task);
        }, delayMs);
        this.pendingTimers.add(timer);
    }

    private clearTimers(): void {
        if (this.tickTimer) {
            clearInterval(this.tickTimer);
            this.tickTimer = null;
        }
        if (this.autosaveTimer) {
            clearInterval(this.autosaveTimer);
            this.autosaveTimer = null;
        }
        for (const timer of this.pendingTimers) {
            clearTimeout(timer);
        }
        this.pendingTimers.clear();
    }

    // -----------------------------------------------------------------------
    // Playback
    // -----------------------------------------------------------------------

    private async onTick(): Promise<void> {
        if (this.connectionState === "streaming" && this.source && !this.holding) {
            this.captureElapsed();
            if (
                this.durationSeconds !== null &&
                this.state.elapsedSeconds >= this.durationSeconds
            ) {
                await this.completeTrack(this.sourceGeneration);
            }
        }
        this.publish();
    }

    private liveElapsed(): number {
        if (this.connectionState === "streaming" && this.connection && this.source) {
            return this.sourceOffset + this.connection.playedSeconds();
        }
        return this.state.elapsedSeconds;
    }

    private captureElapsed(): void {
        if (this.connectionState !== "streaming" || !this.connection || !this.source) {
            return;
        }
        this.state.elapsedSeconds = this.liveElapsed();
        this.state.lastUpdatedAt = this.now();
    }

    private setTrack(trackNumber: number): void {
        this.state.trackNumber = trackNumber;
        this.state.elapsedSeconds = 0;
        this.state.lastUpdatedAt = this.now();
        this.holding = false;
    }

    private closeSource(): void {
        this.sourceGeneration += 1;
        const source = this.source;
        if (!source) return;
        this.source = null;
        this.connection?.halt();
        source.close();
    }

    private syncPause(): void {
        if (!this.connection) return;
        if (this.state.paused) {
            this.connection.pause();
        } else {
            this.connection.resume();
        }
    }

    private async lookupDuration(performerId: string, trackNumber: number): Promise<number | null> {
        try {
            return await this.durations.resolve(performerId, trackNumber);
        } catch (error) {
            const message = isAppError(error, ErrorCode.MEDIA_UNREADABLE)
                ? "Duration unknown; waiting for end-of-stream instead"
                : "Duration lookup failed; waiting for end-of-stream instead";
            log.warn(message, {
                code: ErrorCode.MEDIA_UNREADABLE,
                performerId,
                trackNumber,
                error,
            });
            return null;
        }
    }

    /** Opens the active track at `state.elapsedSeconds` and feeds it to the sink. */
    private async openCurrentSource(): Promise<void> {
        this.closeSource();
        const connection = this.connection;
        if (!connection || this.connectionState !== "streaming") return;

        const generation = this.sourceGeneration;
        const { performerId, trackNumber } = this.state;
        this.holding = false;
        this.durationSeconds = await this.lookupDuration(performerId, trackNumber);

        const filePath = this.catalogue.resolveFile(performerId, trackNumber);
        if (!filePath) {
            this.handleSourceFailure(
                generation,
                new AppError(
                    ErrorCode.MEDIA_UNREADABLE,
                    ErrorCategory.RECOVERABLE,
                    `No file for ${performerId} track ${trackNumber}`
                )
            );
            return;
        }

        const offset = Math.max(0, this.state.elapsedSeconds);
        if (this.durationSeconds !== null && offset >= this.durationSeconds) {
            log.info("Resume offset is past the end of the track", {
                trackNumber,
                offset,
                durationSeconds: this.durationSeconds,
            });
            this.state.elapsedSeconds = this.durationSeconds;
            await this.completeTrack(generation);
            return;
        }

        let source: AudioSource;
        try {
            source = this.sources.open(filePath, offset);
        } catch (error) {
            this.handleSourceFailure(generation, error);
            return;
        }

        this.source = source;
        this.sourceOffset = offset;
        this.state.elapsedSeconds = offset;
        this.state.lastUpdatedAt = this.now();

        connection.feed(source, {
            onEnded: () =>
                this.enqueue("track end", async () => {
                    await this.completeTrack(generation);
                    this.publish();
                }),
            onError: (error) =>
                this.enqueue("source failure", async () => {
                    this.handleSourceFailure(generation, error);
                    this.publish();
                }),
        });

        log.info("Now playing", {
            performerId,
            trackNumber,
            offsetSeconds: Number(offset.toFixed(1)),
            durationSeconds: this.durationSeconds,
        });
    }

    /** Natural end of the current track: apply the loop-mode policy. */
    private async completeTrack(generation: number): Promise<void> {
        if (
            generation !== this.sourceGeneration ||
            this.holding ||
            this.connectionState !== "streaming"
        ) {
            return;
        }

        const finished = this.state.trackNumber;
        const decision = selectNextTrack(
            this.catalogue.tracksFor(this.state.performerId),
            finished,
            this.state.loopMode,
            "natural"
        );

        if (decision.kind === "hold") {
            this.closeSource();
            this.holding = true;
            if (this.durationSeconds !== null) {
                this.state.elapsedSeconds = this.durationSeconds;
            }
            this.state.lastUpdatedAt = this.now();
            log.info(`Track ${finished} was the last one; holding (loop mode off)`);
            return;
        }

        log.info(`Track ${finished} completed`, {
            next: decision.trackNumber,
            loopMode: this.state.loopMode,
        });
        this.setTrack(decision.trackNumber);
        await this.openCurrentSource();
    }

    /** A track that cannot be decoded is skipped after a short pause. */
    private handleSourceFailure(generation: number, error: unknown): void {
        if (generation !== this.sourceGeneration || this.connectionState !== "streaming") {
            return;
        }

        log.warn(`Track ${this.state.trackNumber} could not be played; moving on`, {
            code: ErrorCode.MEDIA_UNREADABLE,
            performerId: this.state.performerId,
            trackNumber: this.state.trackNumber,
            error,
        });
        this.closeSource();

        const failedGeneration = this.sourceGeneration;
        this.schedule(this.sourceFailureDelayMs, "advance after source failure", async () => {
            if (failedGeneration !== this.sourceGeneration || this.connectionState !== "streaming") {
                return;
            }
            const decision = selectNextTrack(
                this.catalogue.tracksFor(this.state.performerId),
                this.state.trackNumber,
                this.state.loopMode,
                "skip"
            );
            if (decision.kind === "play") {
                this.setTrack(decision.trackNumber);
                await this.openCurrentSource();
                this.syncPause();
            }
            this.publish();
        });
    }

    // -----------------------------------------------------------------------
    // Sink connection
    // -----------------------------------------------------------------------

    private async connectSink(): Promise<SinkConnection> {
        let connection: SinkConnection | null = null;
        connection = await this.sink.connect((error) => {
            this.enqueue("sink failure", () => this.handleSinkFailure(connection, error));
        });
        return connection;
    }

    private async establishConnection(): Promise<void> {
        if (this.stopping) return;

        let connection: SinkConnection;
        try {
            connection = await this.connectSink();
        } catch (error) {
            log.warn(`Could not connect to ${this.sink.description}`, {
                code: ErrorCode.SINK_FAILURE,
                error,
            });
            this.enterReconnecting();
            this.publish();
            return;
        }

        await this.attachConnection(connection, 0);
    }

    /** Makes `connection` live, applies queued commands and resumes playback. */
    private async attachConnection(connection: SinkConnection, attempts: number): Promise<void> {
        this.reconnectAbort = null;
        if (this.stopping) {
            await this.closeConnection(connection);
            return;
        }

        this.connection = connection;
        this.connectionState = "streaming";

        for (const mutation of this.deferred.splice(0)) {
            try {
                mutation.apply();
                log.info(`Applied queued ${mutation.label}`);
            } catch (error) {
                log.warn(`Dropped queued ${mutation.label}`, error);
            }
        }

        try {
            await this.openCurrentSource();
            this.syncPause();
        } catch (error) {
            await this.handleSinkFailure(
                connection,
                error instanceof Error ? error : new Error(String(error))
            );
            return;
        }

        if (attempts > 0) {
            log.info(`Reconnected to ${this.sink.description}`, {
                attempts,
                trackNumber: this.state.trackNumber,
                elapsedSeconds: Number(this.state.elapsedSeconds.toFixed(1)),
            });
        } else {
            log.info(`Streaming to ${this.sink.description}`);
        }
        this.publish();
    }

    private async handleSinkFailure(failed: SinkConnection | null, error: Error): Promise<void> {
        if (!failed || failed !== this.connection || this.connectionState !== "streaming") {
            return;
        }

        this.captureElapsed();
        log.warn("Output sink failed; position frozen, reconnecting", {
            code: ErrorCode.SINK_FAILURE,
            trackNumber: this.state.trackNumber,
            elapsedSeconds: Number(this.state.elapsedSeconds.toFixed(1)),
            error,
        });

        this.closeSource();
        this.connection = null;
        await this.closeConnection(failed);
        this.enterReconnecting();
        this.publish();
    }

    private enterReconnecting(): void {
        this.connectionState = "reconnecting";
        if (this.reconnectAbort || this.stopping) return;

        const abort = new AbortController();
        this.reconnectAbort = abort;
        this.reconnectTask = this.reconnectLoop(abort.signal).catch((error: unknown) => {
            log.error("Reconnect loop failed", error);
            if (this.reconnectAbort === abort) {
                this.reconnectAbort = null;
            }
            if (!this.stopping && this.connectionState === "reconnecting") {
                this.enterReconnecting();
            }
        });
    }

    /** Retries forever with capped exponential backoff until shutdown aborts it. */
    private async reconnectLoop(signal: AbortSignal): Promise<void> {
        for (let attempt = 0; ; attempt++) {
            const delayMs = computeBackoffDelay(
                attempt,
                this.reconnectBaseDelayMs,
                this.reconnectMaxDelayMs
            );
            log.info(`Reconnect attempt ${attempt + 1} in ${delayMs}ms`);
            if (!(await sleep(delayMs, signal))) return;

            let connection: SinkConnection;
            try {
                connection = await this.connectSink();
            } catch (error) {
                log.warn(`Reconnect attempt ${attempt + 1} failed`, {
                    code: ErrorCode.SINK_FAILURE,
                    error,
                });
                continue;
            }

            if (signal.aborted) {
                await this.closeConnection(connection);
                return;
            }

            await this.run(() => this.attachConnection(connection, attempt + 1));
            return;
        }
    }

    private async closeConnection(connection: SinkConnection): Promise<void> {
        try {
            await connection.close();
        } catch (error) {
            log.debug("Error while closing sink connection", error);
        }
    }

    // -----------------------------------------------------------------------
    // Shutdown
    // -----------------------------------------------------------------------

    private async performShutdown(): Promise<void> {
        this.stopping = true;
        log.info("Shutting down playback engine");

        await this.shutdownStep("stop reconnect attempts", async () => {
            this.clearTimers();
            this.reconnectAbort?.abort();
            if (this.reconnectTask) {
                await this.reconnectTask;
            }
        });

        // Runs on the command queue so no transition is left half-applied.
        const finalState = await this.run(async () => {
            await this.shutdownStep("close sink and source", async () => {
                this.captureElapsed();
                this.closeSource();
                const connection = this.connection;
                this.connection = null;
                if (connection) {
                    await connection.close();
                }
            });
            this.connectionState = "stopped";
            this.deferred.length = 0;
            return copyPlaybackState(this.state);
        });

        await this.shutdownStep("final save", () => this.writeSnapshot(finalState));
        await this.shutdownStep("release instance lock", async () => {
            await this.lock?.release();
        });

        this.publish();
        log.info("Playback engine stopped", {
            performerId: finalState.performerId,
            trackNumber: finalState.trackNumber,
            elapsedSeconds: Number(finalState.elapsedSeconds.toFixed(1)),
        });
    }

    private writeSnapshot(state: PlaybackState): Promise<void> {
        return this.saves.add(() => this.persistence.save(state));
    }

    private async shutdownStep(name: string, action: () => Promise<void>): Promise<void> {
        try {
            await action();
        } catch (error) {
            log.error(`Shutdown step failed: ${name}`, error);
        }
    }

    private publish(): void {
        if (this.listeners.size === 0) return;
        const snapshot = this.getState();
        for (const listener of this.listeners) {
            try {
                listener(snapshot);
            } catch (error) {
                log.warn("State listener threw", error);
            }
        }
    }
}
