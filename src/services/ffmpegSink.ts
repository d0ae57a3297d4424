import ffmpeg from "fluent-ffmpeg";
import { PassThrough } from "stream";
import { createLogger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import {
    PCM_BYTES_PER_SECOND,
    PCM_CHANNELS,
    PCM_SAMPLE_RATE,
    pcmBytesToSeconds,
    type AudioSource,
    type FeedListener,
    type OutputSink,
    type SinkConnection,
} from "./outputSink";

const log = createLogger("FfmpegSink");

const SILENCE_INTERVAL_MS = 100;
const SILENCE_CHUNK = Buffer.alloc((PCM_BYTES_PER_SECOND * SILENCE_INTERVAL_MS) / 1000);
// Skip silence while ffmpeg still has this much unread input queued.
const MAX_BUFFERED_SILENCE_BYTES = SILENCE_CHUNK.length * 4;
const DEFAULT_CLOSE_TIMEOUT_MS = 5_000;

export const SINK_FORMATS = {
    mp3: { codec: "libmp3lame", container: "mp3", contentType: "audio/mpeg" },
    opus: { codec: "libopus", container: "ogg", contentType: "audio/ogg" },
} as const;

export type SinkFormat = keyof typeof SINK_FORMATS;

export function isSinkFormat(value: string): value is SinkFormat {
    return Object.prototype.hasOwnProperty.call(SINK_FORMATS, value);
}

export interface FfmpegSinkOptions {
    /** Anything ffmpeg can publish to: icecast://, rtmp://, a file path. */
    url: string;
    format: SinkFormat;
    bitrateKbps: number;
    connectTimeoutMs: number;
    ffmpegPath: string;
    closeTimeoutMs?: number;
}

/** Hides credentials embedded in a sink URL. */
export function redactSinkUrl(url: string): string {
    try {
        const parsed = new URL(url);
        if (parsed.password) {
            parsed.password = "***";
        }
        return parsed.toString();
    } catch {
        return url;
    }
}

// ---------------------------------------------------------------------------
// Connection
// ---------------------------------------------------------------------------

interface ActiveFeed {
    source: AudioSource;
    listener: FeedListener;
    bytes: number;
    detach(): void;
}

type ConnectionPhase = "connecting" | "open" | "failed" | "closed";

class FfmpegSinkConnection implements SinkConnection {
    private readonly input = new PassThrough();
    private readonly command: ffmpeg.FfmpegCommand;
    private phase: ConnectionPhase = "connecting";
    private current: ActiveFeed | null = null;
    private paused = false;
    private silenceTimer: NodeJS.Timeout | null = null;
    private exited = false;
    private readonly exit: Promise<void>;
    private markExited: () => void = () => undefined;
    private closing: Promise<void> | null = null;

    constructor(
        private readonly options: FfmpegSinkOptions,
        private readonly onFailure: (error: Error) => void
    ) {
        const format = SINK_FORMATS[options.format];
        this.exit = new Promise<void>((resolve) => {
            this.markExited = () => {
                this.exited = true;
                resolve();
            };
        });

        this.command = ffmpeg()
            .setFfmpegPath(options.ffmpegPath)
            .input(this.input)
            .inputFormat("s16le")
            .inputOptions([
                "-re",
                `-ar ${PCM_SAMPLE_RATE}`,
                `-ac ${PCM_CHANNELS}`,
            ])
            .noVideo()
            .audioCodec(format.codec)
            .audioBitrate(options.bitrateKbps)
            .audioChannels(PCM_CHANNELS)
            .audioFrequency(PCM_SAMPLE_RATE)
            .format(format.container)
            .outputOptions([`-content_type ${format.contentType}`])
            .output(options.url);
    }

    /** Resolves once ffmpeg reports encoding progress. */
    open(): Promise<SinkConnection> {
        return new Promise((resolve, reject) => {
            const timer = setTimeout(() => {
                if (this.phase !== "connecting") return;
                this.phase = "failed";
                this.teardown();
                this.command.kill("SIGKILL");
                reject(
                    new AppError(
                        ErrorCode.SINK_FAILURE,
                        ErrorCategory.TRANSIENT,
                        `Sink did not start within ${this.options.connectTimeoutMs}ms`
                    )
                );
            }, this.options.connectTimeoutMs);

            this.command.on("start", (commandLine: string) => {
                log.debug(`ffmpeg started: ${redactSinkUrl(commandLine)}`);
            });

            this.command.on("progress", () => {
                if (this.phase !== "connecting") return;
                this.phase = "open";
                clearTimeout(timer);
                resolve(this);
            });

            this.command.on("error", (error: Error) => {
                this.markExited();
                if (this.phase === "connecting") {
                    this.phase = "failed";
                    clearTimeout(timer);
                    this.teardown();
                    reject(
                        new AppError(
                            ErrorCode.SINK_FAILURE,
                            ErrorCategory.TRANSIENT,
                            `Sink failed to start: ${error.message}`
                        )
                    );
                    return;
                }
                this.fail(error);
            });

            this.command.on("end", () => {
                this.markExited();
                const error = new Error("Sink process exited");
                if (this.phase === "connecting") {
                    this.phase = "failed";
                    clearTimeout(timer);
                    this.teardown();
                    reject(
                        new AppError(ErrorCode.SINK_FAILURE, ErrorCategory.TRANSIENT, error.message)
                    );
                    return;
                }
                this.fail(error);
            });

            this.input.on("error", (error: Error) => this.fail(error));

            this.startSilence();
            this.command.run();
        });
    }

    feed(source: AudioSource, listener: FeedListener): void {
        this.halt();
        if (this.phase !== "open") return;

        const stream = source.stream;
        const feed: ActiveFeed = {
            source,
            listener,
            bytes: 0,
            detach: () => {
                stream.off("data", onData);
                stream.off("end", onEnd);
                stream.off("error", onError);
                this.input.off("drain", onDrain);
                stream.pause();
            },
        };

        const onDrain = () => {
            if (this.current === feed && !this.paused) {
                stream.resume();
            }
        };
        const onData = (chunk: Buffer) => {
            feed.bytes += chunk.length;
            if (!this.input.write(chunk)) {
                stream.pause();
                this.input.once("drain", onDrain);
            }
        };
        const onEnd = () => {
            if (this.current !== feed) return;
            this.halt();
            listener.onEnded();
        };
        const onError = (error: Error) => {
            if (this.current !== feed) return;
            this.halt();
            listener.onError(error);
        };

        this.current = feed;
        stream.on("data", onData);
        stream.on("end", onEnd);
        stream.on("error", onError);

        if (this.paused) {
            stream.pause();
        } else {
            this.stopSilence();
        }
    }

    halt(): void {
        const feed = this.current;
        this.current = null;
        feed?.detach();
        this.startSilence();
    }

    pause(): void {
        if (this.paused) return;
        this.paused = true;
        this.current?.source.stream.pause();
        this.startSilence();
    }

    resume(): void {
        if (!this.paused) return;
        this.paused = false;
        if (this.current) {
            this.stopSilence();
            this.current.source.stream.resume();
        }
    }

    playedSeconds(): number {
        return this.current ? pcmBytesToSeconds(this.current.bytes) : 0;
    }

    close(): Promise<void> {
        if (!this.closing) {
            this.closing = this.shutDown();
        }
        return this.closing;
    }

    private async shutDown(): Promise<void> {
        this.phase = "closed";
        this.teardown();
        this.input.end();

        const timeoutMs = this.options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
        let timer: NodeJS.Timeout | undefined;
        await Promise.race([
            this.exit,
            new Promise<void>((resolve) => {
                timer = setTimeout(resolve, timeoutMs);
            }),
        ]);
        clearTimeout(timer);

        if (!this.exited) {
            log.warn(`Sink process did not exit within ${timeoutMs}ms; killing it`);
            this.command.kill("SIGKILL");
        }
    }

    private fail(error: Error): void {
        if (this.phase !== "open") return;
        this.phase = "failed";
        this.teardown();
        this.command.kill("SIGKILL");
        this.onFailure(error);
    }

    private teardown(): void {
        const feed = this.current;
        this.current = null;
        feed?.detach();
        this.stopSilence();
    }

    private startSilence(): void {
        if (this.silenceTimer || this.phase === "closed" || this.phase === "failed") return;
        this.silenceTimer = setInterval(() => {
            if (this.input.writableLength < MAX_BUFFERED_SILENCE_BYTES) {
                this.input.write(SILENCE_CHUNK);
            }
        }, SILENCE_INTERVAL_MS);
    }

    private stopSilence(): void {
        if (!this.silenceTimer) return;
        clearInterval(this.silenceTimer);
        this.silenceTimer = null;
    }
}

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

/**
 * Encodes the PCM feed with a single long-lived ffmpeg process and publishes
 * it to `url`. Silence fills the gaps between tracks and while paused, so
 * listeners stay connected across track changes.
 */
export class FfmpegOutputSink implements OutputSink {
    readonly description: string;

    constructor(private readonly options: FfmpegSinkOptions) {
        this.description = `${options.format} stream at ${redactSinkUrl(options.url)}`;
    }

    connect(onFailure: (error: Error) => void): Promise<SinkConnection> {
        return new FfmpegSinkConnection(this.options, onFailure).open();
    }
}
