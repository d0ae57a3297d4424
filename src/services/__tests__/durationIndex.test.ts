import fs from "fs";
import os from "os";
import path from "path";

const mockParseFile = jest.fn<Promise<{ format: { duration?: number } }>, [string, unknown]>();
jest.mock("music-metadata", () => ({
    parseFile: (filePath: string, options: unknown) => mockParseFile(filePath, options),
}));

import { Catalogue } from "../catalogue";
import { DurationIndex, probeDurationSeconds } from "../durationIndex";
import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";

describe("probeDurationSeconds", () => {
    beforeEach(() => {
        mockParseFile.mockReset();
    });

    it("returns the duration reported by the file headers", async () => {
        mockParseFile.mockResolvedValue({ format: { duration: 61.5 } });

        await expect(probeDurationSeconds("/audio/a/001.mp3")).resolves.toBe(61.5);
        expect(mockParseFile).toHaveBeenCalledWith("/audio/a/001.mp3", { duration: true });
    });

    it("rejects files without a duration", async () => {
        mockParseFile.mockResolvedValue({ format: {} });

        await expect(probeDurationSeconds("/audio/a/001.mp3")).rejects.toMatchObject({
            code: ErrorCode.MEDIA_UNREADABLE,
            message: "Cannot read duration of /audio/a/001.mp3: no duration metadata",
        });
    });

    it("rejects files the parser cannot read", async () => {
        mockParseFile.mockRejectedValue(new Error("Unsupported format"));

        await expect(probeDurationSeconds("/audio/a/001.mp3")).rejects.toMatchObject({
            code: ErrorCode.MEDIA_UNREADABLE,
            message: "Cannot read duration of /audio/a/001.mp3: Unsupported format",
        });
    });
});

describe("DurationIndex", () => {
    let dataDir: string;
    let cacheFile: string;
    const catalogue = Catalogue.fromEntries(
        { alpha: { 1: "/a/001.mp3", 2: "/a/002.mp3", 3: "/a/003.mp3" } },
        3
    );

    const readCache = (): unknown => JSON.parse(fs.readFileSync(cacheFile, "utf8"));

    beforeEach(() => {
        dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "durations-"));
        cacheFile = path.join(dataDir, "cache", "durations.json");
    });

    afterEach(() => {
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    it("probes a track once and persists the result", async () => {
        const probe = jest.fn(async (_filePath: string) => 123.4);
        const index = new DurationIndex(catalogue, { cacheFile, probe });

        const [first, second] = await Promise.all([
            index.resolve("alpha", 2),
            index.resolve("alpha", 2),
        ]);

        expect(first).toBe(123.4);
        expect(second).toBe(123.4);
        expect(probe).toHaveBeenCalledTimes(1);
        expect(probe).toHaveBeenCalledWith("/a/002.mp3");
        await index.flush();
        expect(readCache()).toEqual({ "alpha:2": 123.4 });

        await index.resolve("alpha", 2);
        expect(probe).toHaveBeenCalledTimes(1);
    });

    it("loads valid cache entries and ignores the rest", async () => {
        fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
        fs.writeFileSync(
            cacheFile,
            JSON.stringify({ "alpha:1": 10, "alpha:2": -1, "alpha:3": "long" })
        );
        const probe = jest.fn(async (_filePath: string) => 99);
        const index = new DurationIndex(catalogue, { cacheFile, probe });

        await expect(index.load()).resolves.toBe(1);
        await expect(index.resolve("alpha", 1)).resolves.toBe(10);
        expect(probe).not.toHaveBeenCalled();
        expect(index.size).toBe(1);
    });

    it("starts empty when the cache file is not JSON", async () => {
        fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
        fs.writeFileSync(cacheFile, "{not json");
        const index = new DurationIndex(catalogue, { cacheFile, probe: async () => 1 });

        await expect(index.load()).resolves.toBe(0);
        expect(index.size).toBe(0);
    });

    it("does not cache a failed probe", async () => {
        const probe = jest
            .fn<Promise<number>, [string]>()
            .mockRejectedValueOnce(
                new AppError(ErrorCode.MEDIA_UNREADABLE, ErrorCategory.RECOVERABLE, "corrupt header")
            )
            .mockResolvedValueOnce(42);
        const index = new DurationIndex(catalogue, { cacheFile, probe });

        await expect(index.resolve("alpha", 3)).rejects.toMatchObject({
            code: ErrorCode.MEDIA_UNREADABLE,
        });
        await expect(index.resolve("alpha", 3)).resolves.toBe(42);
        expect(probe).toHaveBeenCalledTimes(2);
    });

    it("rejects tracks outside the catalogue without probing", async () => {
        const probe = jest.fn(async (_filePath: string) => 1);
        const index = new DurationIndex(catalogue, { cacheFile, probe });

        await expect(index.resolve("beta", 1)).rejects.toMatchObject({
            code: ErrorCode.MEDIA_UNREADABLE,
        });
        expect(probe).not.toHaveBeenCalled();
    });

    it("probes for playback ahead of a running warm-up", async () => {
        const wide = Catalogue.fromEntries(
            {
                alpha: { 1: "/a/001.mp3", 2: "/a/002.mp3", 3: "/a/003.mp3", 4: "/a/004.mp3" },
                beta: { 1: "/b/001.mp3", 2: "/b/002.mp3", 3: "/b/003.mp3", 4: "/b/004.mp3" },
            },
            4
        );
        const order: string[] = [];
        const probe = jest.fn(async (filePath: string) => {
            order.push(filePath);
            return 30;
        });
        const index = new DurationIndex(wide, { cacheFile, probe, concurrency: 1 });

        const warming = index.warm();
        await expect(index.resolve("beta", 4)).resolves.toBe(30);

        expect(order.slice(0, 2)).toContain("/b/004.mp3");
        await expect(warming).resolves.toEqual({ resolved: 8, failed: 0 });
        expect(probe).toHaveBeenCalledTimes(8);
    });

    it("warms every uncached track and counts failures", async () => {
        fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
        fs.writeFileSync(cacheFile, JSON.stringify({ "alpha:1": 10 }));
        const probe = jest.fn(async (filePath: string) => {
            if (filePath === "/a/003.mp3") {
                throw new AppError(ErrorCode.MEDIA_UNREADABLE, ErrorCategory.RECOVERABLE, "corrupt");
            }
            return 20;
        });
        const index = new DurationIndex(catalogue, { cacheFile, probe });
        await index.load();

        await expect(index.warm()).resolves.toEqual({ resolved: 1, failed: 1 });
        expect(probe).toHaveBeenCalledTimes(2);
        expect(readCache()).toEqual({ "alpha:1": 10, "alpha:2": 20 });
    });
});
