import { parseFile } from "music-metadata";
import PQueue from "p-queue";
import { z } from "zod";
import { createLogger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode, errorMessage } from "../utils/errors";
import { readJsonFile, writeJsonAtomic, type JsonReadResult } from "../utils/atomicFile";
import type { CatalogueReader } from "./catalogue";

const log = createLogger("DurationIndex");

const DEFAULT_PROBE_CONCURRENCY = 2;
const PLAYBACK_PRIORITY = 1;
const WARM_PRIORITY = 0;

export type DurationProbe = (filePath: string) => Promise<number>;

/** What the engine needs from the index. */
export interface DurationResolver {
    resolve(performerId: string, trackNumber: number): Promise<number>;
}

interface PendingProbe {
    promise: Promise<number>;
    priority: number;
}

const durationCacheSchema = z.record(z.unknown());

export function durationKey(performerId: string, trackNumber: number): string {
    return `${performerId}:${trackNumber}`;
}

function mediaUnreadable(filePath: string, reason: string): AppError {
    return new AppError(
        ErrorCode.MEDIA_UNREADABLE,
        ErrorCategory.RECOVERABLE,
        `Cannot read duration of ${filePath}: ${reason}`,
        { filePath }
    );
}

/**
 * Reads the container/stream headers of an audio file and returns its length
 * in seconds.
 */
export async function probeDurationSeconds(filePath: string): Promise<number> {
    let duration: number | undefined;
    try {
        const metadata = await parseFile(filePath, { duration: true });
        duration = metadata.format.duration;
    } catch (error) {
        throw mediaUnreadable(filePath, errorMessage(error));
    }

    if (typeof duration !== "number" || !Number.isFinite(duration) || duration <= 0) {
        throw mediaUnreadable(filePath, "no duration metadata");
    }
    return duration;
}

function isValidDuration(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value) && value > 0;
}

export interface DurationIndexOptions {
    cacheFile: string;
    probe?: DurationProbe;
    concurrency?: number;
}

/**
 * Length of every (performer, track) pair, computed lazily and kept in a
 * durable JSON cache keyed `"performerId:trackNumber"`. Entries are never
 * invalidated: catalogue files are immutable for the daemon's lifetime.
 */
export class DurationIndex implements DurationResolver {
    private readonly entries = new Map<string, number>();
    private readonly inflight = new Map<string, PendingProbe>();
    private readonly probeQueue: PQueue;
    private readonly writeQueue = new PQueue({ concurrency: 1 });
    private readonly cacheFile: string;
    private readonly probe: DurationProbe;

    constructor(
        private readonly catalogue: CatalogueReader,
        options: DurationIndexOptions
    ) {
        this.cacheFile = options.cacheFile;
        this.probe = options.probe ?? probeDurationSeconds;
        this.probeQueue = new PQueue({
            concurrency: options.concurrency ?? DEFAULT_PROBE_CONCURRENCY,
        });
    }

    get size(): number {
        return this.entries.size;
    }

    /** Loads the durable cache. Returns the number of usable entries. */
    async load(): Promise<number> {
        let result: JsonReadResult;
        try {
            result = await readJsonFile(this.cacheFile);
        } catch (error) {
            log.warn(`Duration cache unreadable, starting empty: ${this.cacheFile}`, error);
            return 0;
        }

        if (result.status === "missing") {
            log.debug(`No duration cache at ${this.cacheFile}`);
            return 0;
        }

        const parsed =
            result.status === "ok" ? durationCacheSchema.safeParse(result.value) : null;
        if (!parsed || !parsed.success) {
            log.warn(`Ignoring malformed duration cache: ${this.cacheFile}`);
            return 0;
        }

        let skipped = 0;
        for (const [key, value] of Object.entries(parsed.data)) {
            if (isValidDuration(value)) {
                this.entries.set(key, value);
            } else {
                skipped += 1;
            }
        }

        log.info("Duration cache loaded", {
            cacheFile: this.cacheFile,
            entries: this.entries.size,
            skipped,
        });
        return this.entries.size;
    }

    /**
     * Returns the track length in seconds. Concurrent calls for the same key
     * share one probe, and probes for playback jump ahead of a running
     * warm-up. Throws MEDIA_UNREADABLE when the file has no usable duration.
     */
    resolve(performerId: string, trackNumber: number): Promise<number> {
        return this.lookup(performerId, trackNumber, PLAYBACK_PRIORITY);
    }

    /**
     * Resolves every catalogue entry that is not cached yet. Unreadable files
     * are logged and skipped. Settles once the cache file is written.
     */
    async warm(): Promise<{ resolved: number; failed: number }> {
        const missing = this.catalogueEntries().filter(
            ({ performerId, trackNumber }) =>
                !this.entries.has(durationKey(performerId, trackNumber))
        );

        let resolved = 0;
        let failed = 0;
        await Promise.all(
            missing.map(async ({ performerId, trackNumber }) => {
                try {
                    await this.lookup(performerId, trackNumber, WARM_PRIORITY);
                    resolved += 1;
                } catch (error) {
                    failed += 1;
                    log.warn(`Duration unavailable for ${durationKey(performerId, trackNumber)}`, {
                        code: ErrorCode.MEDIA_UNREADABLE,
                        error,
                    });
                }
            })
        );
        await this.flush();

        return { resolved, failed };
    }

    /** Waits for pending cache writes. */
    flush(): Promise<void> {
        return this.writeQueue.onIdle();
    }

    private lookup(performerId: string, trackNumber: number, priority: number): Promise<number> {
        const key = durationKey(performerId, trackNumber);
        const cached = this.entries.get(key);
        if (cached !== undefined) {
            return Promise.resolve(cached);
        }

        const pending = this.inflight.get(key);
        if (pending && pending.priority >= priority) {
            return pending.promise;
        }

        const filePath = this.catalogue.resolveFile(performerId, trackNumber);
        if (!filePath) {
            return Promise.reject(
                mediaUnreadable(`${performerId}/${trackNumber}`, "not in catalogue")
            );
        }

        // A warm-up probe still queued for this key finds the entry and skips.
        const promise: Promise<number> = this.probeQueue
            .add(async () => this.entries.get(key) ?? this.probe(filePath), { priority })
            .then((duration) => {
                if (!this.entries.has(key)) {
                    this.entries.set(key, duration);
                    log.debug(`Duration resolved for ${key}: ${duration.toFixed(1)}s`);
                    this.schedulePersist();
                }
                return duration;
            })
            .finally(() => {
                if (this.inflight.get(key)?.promise === promise) {
                    this.inflight.delete(key);
                }
            });

        this.inflight.set(key, { promise, priority });
        return promise;
    }

    private catalogueEntries(): Array<{ performerId: string; trackNumber: number }> {
        return this.catalogue.listPerformers().flatMap((performerId) =>
            this.catalogue
                .tracksFor(performerId)
                .map((trackNumber) => ({ performerId, trackNumber }))
        );
    }

    /**
     * Writes are serialised; a write already waiting in the queue will pick
     * up the newest entries, so no second one is queued behind it.
     */
    private schedulePersist(): void {
        if (this.writeQueue.size > 0) return;
        this.writeQueue.add(() => this.writeCache()).catch((error: unknown) => {
            log.warn(`Failed to write duration cache ${this.cacheFile}`, error);
        });
    }

    private async writeCache(): Promise<void> {
        const payload: Record<string, number> = {};
        for (const [key, value] of this.entries) {
            payload[key] = value;
        }

        try {
            await writeJsonAtomic(this.cacheFile, payload);
        } catch (error) {
            log.warn(`Failed to write duration cache ${this.cacheFile}`, error);
        }
    }
}
