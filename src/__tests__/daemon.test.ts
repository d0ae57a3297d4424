import fs from "fs";
import os from "os";
import path from "path";
import { startDaemon, type RunningDaemon } from "../daemon";
import type { DaemonConfig } from "../config";
import type { ProcessControl } from "../services/singletonGuard";
import { FakeSink, FakeSources } from "../services/__tests__/helpers/engineFakes";
import { ErrorCode } from "../utils/errors";

describe("startDaemon", () => {
    const RUNNING_PID = 4242;
    let rootDir: string;
    let config: DaemonConfig;
    let sink: FakeSink;
    let sources: FakeSources;
    let daemon: RunningDaemon | null;

    const processControl: ProcessControl = {
        isAlive: (pid) => pid === RUNNING_PID || pid === process.pid,
        signal: jest.fn(),
    };
    const probe = jest.fn(async (_filePath: string) => 10);

    const start = async (force = false) => {
        daemon = await startDaemon({ config, force, sink, sources, processControl, probe });
        await daemon.durations.warm();
        return daemon;
    };

    beforeEach(() => {
        rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "daemon-"));
        const audioDir = path.join(rootDir, "audio");
        fs.mkdirSync(path.join(audioDir, "alpha"), { recursive: true });
        fs.writeFileSync(path.join(audioDir, "alpha", "001.mp3"), "");
        fs.writeFileSync(path.join(audioDir, "alpha", "002.mp3"), "");

        config = {
            nodeEnv: "test",
            audioDir,
            trackCount: 114,
            defaultPerformer: null,
            defaultLoopMode: "repeat-all",
            stateFile: path.join(rootDir, "data", "state.json"),
            durationCacheFile: path.join(rootDir, "data", "durations.json"),
            lockFile: path.join(rootDir, "data", "daemon.lock"),
            sink: {
                url: "icecast://localhost:8000/live",
                format: "mp3",
                bitrateKbps: 128,
                connectTimeoutMs: 1_000,
                ffmpegPath: "/usr/bin/ffmpeg",
            },
            tickIntervalMs: 1_000,
            autosaveIntervalMs: 30_000,
            reconnectBaseDelayMs: 1_000,
            reconnectMaxDelayMs: 4_000,
            takeoverTimeoutMs: 50,
            control: { enabled: false, host: "127.0.0.1", port: 3020, token: null },
        };
        sink = new FakeSink();
        sources = new FakeSources();
        daemon = null;
    });

    afterEach(async () => {
        if (daemon) {
            await daemon.shutdown();
        }
        fs.rmSync(rootDir, { recursive: true, force: true });
    });

    it("resumes from the saved snapshot", async () => {
        fs.mkdirSync(path.dirname(config.stateFile), { recursive: true });
        fs.writeFileSync(
            config.stateFile,
            JSON.stringify({
                schemaVersion: 1,
                performerId: "alpha",
                trackNumber: 2,
                elapsedSeconds: 3,
                loopMode: "off",
                savedAt: "2024-05-01T12:00:00.000Z",
            })
        );

        const running = await start();

        expect(sources.open).toHaveBeenCalledWith(path.join(config.audioDir, "alpha", "002.mp3"), 3);
        expect(running.engine.getState()).toMatchObject({
            performerId: "alpha",
            trackNumber: 2,
            elapsedSeconds: 3,
            loopMode: "off",
            connectionState: "streaming",
        });
    });

    it("saves the position and drops the lock on shutdown", async () => {
        const running = await start();
        expect(fs.existsSync(config.lockFile)).toBe(true);

        await running.shutdown();
        daemon = null;

        expect(fs.existsSync(config.lockFile)).toBe(false);
        expect(JSON.parse(fs.readFileSync(config.stateFile, "utf8"))).toMatchObject({
            performerId: "alpha",
            trackNumber: 1,
            elapsedSeconds: 0,
            loopMode: "repeat-all",
        });
        expect(JSON.parse(fs.readFileSync(config.durationCacheFile, "utf8"))).toEqual({
            "alpha:1": 10,
            "alpha:2": 10,
        });
    });

    it("never touches the sink while another instance runs", async () => {
        fs.mkdirSync(path.dirname(config.lockFile), { recursive: true });
        fs.writeFileSync(
            config.lockFile,
            JSON.stringify({ ownerProcessId: RUNNING_PID, acquiredAt: "2024-05-01T12:00:00.000Z" })
        );

        await expect(startDaemon({ config, sink, sources, processControl, probe })).rejects.toMatchObject({
            code: ErrorCode.ALREADY_RUNNING,
        });
        expect(sink.connect).not.toHaveBeenCalled();
    });

    it("releases the lock when the catalogue cannot be read", async () => {
        config.audioDir = path.join(rootDir, "missing");

        await expect(startDaemon({ config, sink, sources, processControl, probe })).rejects.toMatchObject({
            code: ErrorCode.CATALOGUE_UNAVAILABLE,
        });
        expect(fs.existsSync(config.lockFile)).toBe(false);
        expect(sink.connect).not.toHaveBeenCalled();
    });
});
