import type { Readable } from "stream";

// Raw PCM exchanged between sources and the sink.
export const PCM_SAMPLE_RATE = 48_000;
export const PCM_CHANNELS = 2;
export const PCM_BYTES_PER_SAMPLE = 2;
export const PCM_BYTES_PER_SECOND = PCM_SAMPLE_RATE * PCM_CHANNELS * PCM_BYTES_PER_SAMPLE;

export function pcmBytesToSeconds(bytes: number): number {
    return bytes / PCM_BYTES_PER_SECOND;
}

/** One decoded track, starting at `offsetSeconds`. */
export interface AudioSource {
    readonly filePath: string;
    readonly offsetSeconds: number;
    readonly stream: Readable;
    close(): void;
}

export interface AudioSourceFactory {
    open(filePath: string, offsetSeconds: number): AudioSource;
}

export interface FeedListener {
    /** The source drained completely into the sink (end-of-stream). */
    onEnded(): void;
    /** The source failed before reaching its end. */
    onError(error: Error): void;
}

/**
 * A live connection to the output. Survives track changes; only a sink
 * failure or `close()` ends it.
 */
export interface SinkConnection {
    /** Replaces whatever is playing with `source`. */
    feed(source: AudioSource, listener: FeedListener): void;
    /** Detaches the current source without ending the connection. */
    halt(): void;
    pause(): void;
    resume(): void;
    /** Seconds of the current source the sink has consumed since `feed`. */
    playedSeconds(): number;
    close(): Promise<void>;
}

export interface OutputSink {
    readonly description: string;
    /**
     * Opens the output. `onFailure` fires at most once, for an I/O failure
     * after the returned promise resolved.
     */
    connect(onFailure: (error: Error) => void): Promise<SinkConnection>;
}
