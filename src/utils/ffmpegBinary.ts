import fs from "fs";
import ffmpegInstaller from "@ffmpeg-installer/ffmpeg";

const SYSTEM_FFMPEG_PATH = "/usr/bin/ffmpeg";

/**
 * Picks the ffmpeg binary: an explicit path wins, then the system build
 * (usually has more encoders), then the bundled installer binary.
 */
export function resolveFfmpegBinaryPath(configuredPath?: string | null): string {
    const trimmed = configuredPath?.trim();
    if (trimmed) {
        return trimmed;
    }
    if (fs.existsSync(SYSTEM_FFMPEG_PATH)) {
        return SYSTEM_FFMPEG_PATH;
    }
    return ffmpegInstaller.path;
}
