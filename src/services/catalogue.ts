import { promises as fsPromises } from "fs";
import * as path from "path";
import { createLogger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode, errorMessage } from "../utils/errors";

const log = createLogger("Catalogue");

export const DEFAULT_TRACK_COUNT = 114;

const AUDIO_FILE_PATTERN = /^(\d{1,4})\.(mp3|ogg|opus|flac|m4a|wav)$/i;

/** Read side of the catalogue, as the engine and the control surface use it. */
export interface CatalogueReader {
    readonly trackCount: number;
    listPerformers(): string[];
    hasPerformer(performerId: string): boolean;
    /** Available track numbers for a performer, ascending. */
    tracksFor(performerId: string): number[];
    hasTrack(performerId: string, trackNumber: number): boolean;
    resolveFile(performerId: string, trackNumber: number): string | null;
}

export interface CatalogueScanOptions {
    trackCount?: number;
}

/**
 * The fixed, ordered set of recordings per performer. Built once at start-up
 * from `<audioDir>/<performer>/<NNN>.<ext>` and never mutated afterwards.
 */
export class Catalogue implements CatalogueReader {
    private readonly performers: Map<string, Map<number, string>>;

    private constructor(
        performers: Map<string, Map<number, string>>,
        readonly trackCount: number
    ) {
        this.performers = performers;
    }

    static fromEntries(
        entries: Record<string, Record<number, string>>,
        trackCount: number = DEFAULT_TRACK_COUNT
    ): Catalogue {
        const performers = new Map<string, Map<number, string>>();
        for (const [performerId, files] of Object.entries(entries)) {
            const tracks = new Map<number, string>();
            for (const [trackNumber, filePath] of Object.entries(files)) {
                const parsed = Number(trackNumber);
                if (isTrackNumberInRange(parsed, trackCount)) {
                    tracks.set(parsed, filePath);
                }
            }
            if (tracks.size > 0) {
                performers.set(performerId, tracks);
            }
        }
        return new Catalogue(performers, trackCount);
    }

    static async scan(
        audioDir: string,
        options: CatalogueScanOptions = {}
    ): Promise<Catalogue> {
        const trackCount = options.trackCount ?? DEFAULT_TRACK_COUNT;
        const root = path.resolve(audioDir);

        let performerDirs: string[];
        try {
            const entries = await fsPromises.readdir(root, { withFileTypes: true });
            performerDirs = entries
                .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
                .map((entry) => entry.name)
                .sort((a, b) => a.localeCompare(b));
        } catch (error) {
            throw new AppError(
                ErrorCode.CATALOGUE_UNAVAILABLE,
                ErrorCategory.FATAL,
                `Audio directory is not readable: ${root}`,
                { audioDir: root, originalError: errorMessage(error) }
            );
        }

        const performers = new Map<string, Map<number, string>>();
        for (const performerId of performerDirs) {
            const performerDir = path.join(root, performerId);
            const files = await fsPromises.readdir(performerDir);
            const tracks = new Map<number, string>();

            for (const fileName of files) {
                const match = AUDIO_FILE_PATTERN.exec(fileName);
                if (!match) continue;
                const trackNumber = Number.parseInt(match[1], 10);
                if (!isTrackNumberInRange(trackNumber, trackCount)) continue;
                // First file wins when a track exists in several formats.
                if (!tracks.has(trackNumber)) {
                    tracks.set(trackNumber, path.join(performerDir, fileName));
                }
            }

            if (tracks.size === 0) {
                log.warn(`Skipping performer without playable tracks: ${performerId}`);
                continue;
            }
            if (tracks.size < trackCount) {
                log.info(`Performer ${performerId} has ${tracks.size}/${trackCount} tracks`);
            }
            performers.set(performerId, tracks);
        }

        if (performers.size === 0) {
            throw new AppError(
                ErrorCode.CATALOGUE_UNAVAILABLE,
                ErrorCategory.FATAL,
                `No performer with playable tracks under ${root}`,
                { audioDir: root }
            );
        }

        return new Catalogue(performers, trackCount);
    }

    listPerformers(): string[] {
        return Array.from(this.performers.keys());
    }

    hasPerformer(performerId: string): boolean {
        return this.performers.has(performerId);
    }

    tracksFor(performerId: string): number[] {
        const tracks = this.performers.get(performerId);
        if (!tracks) return [];
        return Array.from(tracks.keys()).sort((a, b) => a - b);
    }

    hasTrack(performerId: string, trackNumber: number): boolean {
        return this.performers.get(performerId)?.has(trackNumber) ?? false;
    }

    resolveFile(performerId: string, trackNumber: number): string | null {
        return this.performers.get(performerId)?.get(trackNumber) ?? null;
    }
}

export function isTrackNumberInRange(trackNumber: number, trackCount: number): boolean {
    return Number.isInteger(trackNumber) && trackNumber >= 1 && trackNumber <= trackCount;
}
