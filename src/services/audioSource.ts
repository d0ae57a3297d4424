import ffmpeg from "fluent-ffmpeg";
import { PassThrough } from "stream";
import { createLogger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import {
    PCM_CHANNELS,
    PCM_SAMPLE_RATE,
    type AudioSource,
    type AudioSourceFactory,
} from "./outputSink";

const log = createLogger("AudioSource");

/**
 * Decodes tracks to raw PCM with one ffmpeg process per track.
 */
export class FfmpegSourceFactory implements AudioSourceFactory {
    constructor(private readonly ffmpegPath: string) {}

    open(filePath: string, offsetSeconds: number): AudioSource {
        const output = new PassThrough();
        let closed = false;

        const command = ffmpeg(filePath).setFfmpegPath(this.ffmpegPath);
        if (offsetSeconds > 0) {
            command.seekInput(offsetSeconds);
        }

        command
            .noVideo()
            .audioChannels(PCM_CHANNELS)
            .audioFrequency(PCM_SAMPLE_RATE)
            .format("s16le")
            .on("start", () => {
                // close() can run before the process has spawned.
                if (closed) {
                    command.kill("SIGKILL");
                }
            })
            .on("error", (error: Error) => {
                if (closed) return;
                log.debug(`Decoder failed for ${filePath}: ${error.message}`);
                output.destroy(
                    new AppError(
                        ErrorCode.MEDIA_UNREADABLE,
                        ErrorCategory.RECOVERABLE,
                        `Could not decode ${filePath}: ${error.message}`,
                        { filePath, offsetSeconds }
                    )
                );
            });

        command.pipe(output, { end: true });

        return {
            filePath,
            offsetSeconds,
            stream: output,
            close: () => {
                if (closed) return;
                closed = true;
                command.kill("SIGKILL");
                output.destroy();
            },
        };
    }
}
