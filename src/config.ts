import dotenv from "dotenv";
import path from "path";
import { z } from "zod";
import { LOOP_MODES, type LoopMode } from "./services/playbackState";
import { DEFAULT_TRACK_COUNT } from "./services/catalogue";
import { isSinkFormat, type SinkFormat } from "./services/ffmpegSink";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import {
    isEnvFlagEnabled,
    parseEnvString,
    parsePositiveEnvInt,
} from "./utils/envParsers";

export interface DaemonConfig {
    nodeEnv: string;
    audioDir: string;
    trackCount: number;
    defaultPerformer: string | null;
    defaultLoopMode: LoopMode;
    stateFile: string;
    durationCacheFile: string;
    lockFile: string;
    sink: {
        url: string;
        format: SinkFormat;
        bitrateKbps: number;
        connectTimeoutMs: number;
        ffmpegPath: string | null;
    };
    tickIntervalMs: number;
    autosaveIntervalMs: number;
    reconnectBaseDelayMs: number;
    reconnectMaxDelayMs: number;
    takeoverTimeoutMs: number;
    control: {
        enabled: boolean;
        host: string;
        port: number;
        token: string | null;
    };
}

const optionalString = z.string().optional();

const envSchema = z
    .object({
        NODE_ENV: z.enum(["development", "production", "test"]).optional(),
        AUDIO_DIR: optionalString,
        CATALOGUE_TRACK_COUNT: optionalString,
        DEFAULT_PERFORMER: optionalString,
        DEFAULT_LOOP_MODE: z
            .string()
            .optional()
            .refine(
                (value) => value === undefined || value.trim() === "" || LOOP_MODES.some((mode) => mode === value.trim()),
                { message: `must be one of ${LOOP_MODES.join(", ")}` }
            ),
        STATE_FILE: optionalString,
        DURATION_CACHE_FILE: optionalString,
        LOCK_FILE: optionalString,
        SINK_URL: z
            .string({ required_error: "SINK_URL is required" })
            .trim()
            .min(1, "SINK_URL is required"),
        SINK_FORMAT: z
            .string()
            .optional()
            .refine(
                (value) => value === undefined || value.trim() === "" || isSinkFormat(value.trim()),
                { message: "must be mp3 or opus" }
            ),
        SINK_BITRATE_KBPS: optionalString,
        SINK_CONNECT_TIMEOUT_MS: optionalString,
        FFMPEG_PATH: optionalString,
        TICK_INTERVAL_MS: optionalString,
        AUTOSAVE_INTERVAL_MS: optionalString,
        RECONNECT_BASE_DELAY_MS: optionalString,
        RECONNECT_MAX_DELAY_MS: optionalString,
        TAKEOVER_TIMEOUT_MS: optionalString,
        CONTROL_ENABLED: optionalString,
        CONTROL_HOST: optionalString,
        CONTROL_PORT: optionalString,
        CONTROL_TOKEN: optionalString,
    })
    .passthrough();

function toLoopMode(value: string | undefined): LoopMode {
    const trimmed = parseEnvString(value);
    return LOOP_MODES.find((mode) => mode === trimmed) ?? "repeat-all";
}

function toSinkFormat(value: string | undefined): SinkFormat {
    const trimmed = parseEnvString(value);
    return trimmed && isSinkFormat(trimmed) ? trimmed : "mp3";
}

/** Loads `.env` from the working directory into `process.env`. */
export function loadEnvFile(): void {
    dotenv.config();
}

/**
 * Builds the daemon configuration from `env`. Throws INVALID_CONFIG listing
 * every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DaemonConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.errors.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
        );
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Invalid configuration: ${issues.join("; ")}`,
            { issues }
        );
    }

    const vars = parsed.data;
    const reconnectBaseDelayMs = parsePositiveEnvInt(vars.RECONNECT_BASE_DELAY_MS, 10_000);
    const reconnectMaxDelayMs = Math.max(
        reconnectBaseDelayMs,
        parsePositiveEnvInt(vars.RECONNECT_MAX_DELAY_MS, 60_000)
    );

    return {
        nodeEnv: vars.NODE_ENV ?? "development",
        audioDir: path.resolve(parseEnvString(vars.AUDIO_DIR) ?? "./audio"),
        trackCount: parsePositiveEnvInt(vars.CATALOGUE_TRACK_COUNT, DEFAULT_TRACK_COUNT),
        defaultPerformer: parseEnvString(vars.DEFAULT_PERFORMER) ?? null,
        defaultLoopMode: toLoopMode(vars.DEFAULT_LOOP_MODE),
        stateFile: path.resolve(parseEnvString(vars.STATE_FILE) ?? "./data/playback-state.json"),
        durationCacheFile: path.resolve(
            parseEnvString(vars.DURATION_CACHE_FILE) ?? "./data/duration-cache.json"
        ),
        lockFile: path.resolve(parseEnvString(vars.LOCK_FILE) ?? "./data/daemon.lock"),
        sink: {
            url: vars.SINK_URL,
            format: toSinkFormat(vars.SINK_FORMAT),
            bitrateKbps: parsePositiveEnvInt(vars.SINK_BITRATE_KBPS, 128),
            connectTimeoutMs: parsePositiveEnvInt(vars.SINK_CONNECT_TIMEOUT_MS, 15_000),
            ffmpegPath: parseEnvString(vars.FFMPEG_PATH) ?? null,
        },
        tickIntervalMs: parsePositiveEnvInt(vars.TICK_INTERVAL_MS, 1_000),
        autosaveIntervalMs: parsePositiveEnvInt(vars.AUTOSAVE_INTERVAL_MS, 30_000),
        reconnectBaseDelayMs,
        reconnectMaxDelayMs,
        takeoverTimeoutMs: parsePositiveEnvInt(vars.TAKEOVER_TIMEOUT_MS, 5_000),
        control: {
            enabled: isEnvFlagEnabled(vars.CONTROL_ENABLED, true),
            host: parseEnvString(vars.CONTROL_HOST) ?? "127.0.0.1",
            port: parsePositiveEnvInt(vars.CONTROL_PORT, 3020),
            token: parseEnvString(vars.CONTROL_TOKEN) ?? null,
        },
    };
}
