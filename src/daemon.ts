import type { DaemonConfig } from "./config";
import { createLogger, withLogTiming } from "./utils/logger";
import { Catalogue } from "./services/catalogue";
import { DurationIndex, type DurationProbe } from "./services/durationIndex";
import { PersistenceStore } from "./services/persistenceStore";
import { SingletonGuard, type ExclusiveHandle, type ProcessControl } from "./services/singletonGuard";
import { StreamEngine } from "./services/streamEngine";
import { FfmpegOutputSink } from "./services/ffmpegSink";
import { FfmpegSourceFactory } from "./services/audioSource";
import { restorePlaybackState } from "./services/playbackState";
import type { AudioSourceFactory, OutputSink } from "./services/outputSink";
import { resolveFfmpegBinaryPath } from "./utils/ffmpegBinary";
import { createControlApp, startControlServer, type ControlServer } from "./server";

const log = createLogger("Daemon");

export interface DaemonOptions {
    config: DaemonConfig;
    /** Take over from a running instance instead of refusing to start. */
    force?: boolean;
    sink?: OutputSink;
    sources?: AudioSourceFactory;
    processControl?: ProcessControl;
    probe?: DurationProbe;
}

export interface RunningDaemon {
    readonly engine: StreamEngine;
    readonly catalogue: Catalogue;
    readonly durations: DurationIndex;
    readonly control: ControlServer | null;
    shutdown(): Promise<void>;
}

/**
 * Boots the daemon: lock, catalogue, durations, last snapshot, engine and
 * control API. Nothing touches the sink before the lock is held.
 */
export async function startDaemon(options: DaemonOptions): Promise<RunningDaemon> {
    const { config } = options;
    const guard = new SingletonGuard({
        lockFile: config.lockFile,
        processControl: options.processControl,
        takeoverTimeoutMs: config.takeoverTimeoutMs,
    });
    const lock = await guard.acquire(options.force ?? false);

    let engine: StreamEngine | null = null;
    try {
        const catalogue = await withLogTiming(
            log,
            "Catalogue scan",
            () => Catalogue.scan(config.audioDir, { trackCount: config.trackCount }),
            { audioDir: config.audioDir }
        );

        const durations = new DurationIndex(catalogue, {
            cacheFile: config.durationCacheFile,
            probe: options.probe,
        });
        await durations.load();

        const persistence = new PersistenceStore({ stateFile: config.stateFile });
        const initialState = restorePlaybackState(await persistence.load(), catalogue, {
            performerId: config.defaultPerformer ?? undefined,
            loopMode: config.defaultLoopMode,
        });

        const ffmpegPath = resolveFfmpegBinaryPath(config.sink.ffmpegPath);
        const sink =
            options.sink ??
            new FfmpegOutputSink({
                url: config.sink.url,
                format: config.sink.format,
                bitrateKbps: config.sink.bitrateKbps,
                connectTimeoutMs: config.sink.connectTimeoutMs,
                ffmpegPath,
            });
        const sources = options.sources ?? new FfmpegSourceFactory(ffmpegPath);

        const activeEngine = new StreamEngine({
            catalogue,
            durations,
            persistence,
            sink,
            sources,
            lock,
            initialState,
            tickIntervalMs: config.tickIntervalMs,
            autosaveIntervalMs: config.autosaveIntervalMs,
            reconnectBaseDelayMs: config.reconnectBaseDelayMs,
            reconnectMaxDelayMs: config.reconnectMaxDelayMs,
        });
        engine = activeEngine;
        await activeEngine.start();

        withLogTiming(log, "Duration warm-up", () => durations.warm())
            .then(({ resolved, failed }) => {
                log.info("Duration index ready", { resolved, failed, cached: durations.size });
            })
            .catch((error: unknown) => {
                log.error("Duration warm-up failed", error);
            });

        const control = config.control.enabled
            ? await startControlServer(
                  createControlApp(activeEngine, catalogue, { token: config.control.token }),
                  config.control.host,
                  config.control.port
              )
            : null;

        let stopping: Promise<void> | null = null;
        const shutdown = (): Promise<void> => {
            if (!stopping) {
                stopping = (async () => {
                    if (control) {
                        await control.close();
                    }
                    await activeEngine.shutdown();
                    await durations.flush();
                })();
            }
            return stopping;
        };

        return { engine: activeEngine, catalogue, durations, control, shutdown };
    } catch (error) {
        await abortStartup(engine, lock);
        throw error;
    }
}

async function abortStartup(engine: StreamEngine | null, lock: ExclusiveHandle): Promise<void> {
    try {
        if (engine) {
            // Releases the lock as its last step.
            await engine.shutdown();
        } else {
            await lock.release();
        }
    } catch (error) {
        log.error("Cleanup after failed start-up failed", error);
    }
}
