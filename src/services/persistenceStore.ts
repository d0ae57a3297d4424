import * as path from "path";
import { z } from "zod";
import { createLogger } from "../utils/logger";
import { ErrorCode } from "../utils/errors";
import { readJsonFile, writeJsonAtomic, type JsonReadResult } from "../utils/atomicFile";
import { LOOP_MODES, type PlaybackState, type RestoredPlayback } from "./playbackState";

const log = createLogger("PersistenceStore");

export const SNAPSHOT_SCHEMA_VERSION = 1;

const persistedSnapshotSchema = z.object({
    schemaVersion: z.literal(SNAPSHOT_SCHEMA_VERSION),
    performerId: z.string().min(1),
    trackNumber: z.number().int().positive(),
    elapsedSeconds: z.number().nonnegative(),
    loopMode: z.enum(LOOP_MODES),
    savedAt: z.string(),
});

export type PersistedSnapshot = z.infer<typeof persistedSnapshotSchema>;

/** What the engine needs to persist its position. */
export interface SnapshotWriter {
    save(state: PlaybackState): Promise<void>;
}

export interface PersistenceStoreOptions {
    stateFile: string;
    now?: () => Date;
}

export function toPersistedSnapshot(state: PlaybackState, savedAt: Date): PersistedSnapshot {
    return {
        schemaVersion: SNAPSHOT_SCHEMA_VERSION,
        performerId: state.performerId,
        trackNumber: state.trackNumber,
        elapsedSeconds: Math.max(0, state.elapsedSeconds),
        loopMode: state.loopMode,
        savedAt: savedAt.toISOString(),
    };
}

/**
 * Durable copy of the playback position. A missing, unparseable or
 * version-mismatched file reads as "no snapshot" (first run).
 */
export class PersistenceStore implements SnapshotWriter {
    readonly stateFile: string;
    private readonly now: () => Date;

    constructor(options: PersistenceStoreOptions) {
        this.stateFile = path.resolve(options.stateFile);
        this.now = options.now ?? (() => new Date());
    }

    async save(state: PlaybackState): Promise<void> {
        const snapshot = toPersistedSnapshot(state, this.now());
        await writeJsonAtomic(this.stateFile, snapshot);
        log.debug("Snapshot saved", {
            performerId: snapshot.performerId,
            trackNumber: snapshot.trackNumber,
            elapsedSeconds: Number(snapshot.elapsedSeconds.toFixed(1)),
        });
    }

    async load(): Promise<RestoredPlayback | null> {
        let result: JsonReadResult;
        try {
            result = await readJsonFile(this.stateFile);
        } catch (error) {
            log.warn(`Snapshot unreadable, starting fresh: ${this.stateFile}`, {
                code: ErrorCode.SNAPSHOT_CORRUPT,
                error,
            });
            return null;
        }

        if (result.status === "missing") {
            log.info(`No previous snapshot at ${this.stateFile}; starting fresh`);
            return null;
        }

        if (result.status === "invalid") {
            log.warn(`Discarding unparseable snapshot: ${this.stateFile}`, {
                code: ErrorCode.SNAPSHOT_CORRUPT,
                error: result.error,
            });
            return null;
        }

        const parsed = persistedSnapshotSchema.safeParse(result.value);
        if (!parsed.success) {
            log.warn(`Discarding snapshot that fails validation: ${this.stateFile}`, {
                code: ErrorCode.SNAPSHOT_CORRUPT,
                issues: parsed.error.issues.map(
                    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
                ),
            });
            return null;
        }

        const { performerId, trackNumber, elapsedSeconds, loopMode, savedAt } = parsed.data;
        log.info("Snapshot restored", { performerId, trackNumber, elapsedSeconds, loopMode, savedAt });
        return { performerId, trackNumber, elapsedSeconds, loopMode, savedAt };
    }
}
