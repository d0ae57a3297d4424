jest.mock("@ffmpeg-installer/ffmpeg", () => ({
    __esModule: true,
    default: { path: "/mock/bin/ffmpeg" },
}));

import fs from "fs";
import { resolveFfmpegBinaryPath } from "../ffmpegBinary";

describe("resolveFfmpegBinaryPath", () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it("prefers an explicitly configured binary", () => {
        expect(resolveFfmpegBinaryPath("  /opt/ffmpeg/bin/ffmpeg ")).toBe("/opt/ffmpeg/bin/ffmpeg");
    });

    it("falls back to the system ffmpeg when present", () => {
        jest.spyOn(fs, "existsSync").mockReturnValue(true);

        expect(resolveFfmpegBinaryPath(null)).toBe("/usr/bin/ffmpeg");
    });

    it("uses the bundled binary when there is no system ffmpeg", () => {
        jest.spyOn(fs, "existsSync").mockReturnValue(false);

        expect(resolveFfmpegBinaryPath("   ")).toBe("/mock/bin/ffmpeg");
    });
});
