import fs from "fs";
import os from "os";
import path from "path";
import { SingletonGuard, type ExclusiveHandle, type ProcessControl } from "../singletonGuard";
import { ErrorCode } from "../../utils/errors";

describe("SingletonGuard", () => {
    const SELF = 1111;
    const OTHER = 2222;

    let dataDir: string;
    let lockFile: string;
    let alive: Set<number>;
    let handles: ExclusiveHandle[];
    let processControl: ProcessControl & { signal: jest.Mock<void, [number, NodeJS.Signals]> };

    const guard = (processId = SELF) =>
        new SingletonGuard({
            lockFile,
            processId,
            processControl,
            takeoverTimeoutMs: 50,
            pollIntervalMs: 5,
        });

    const acquire = async (force = false, processId = SELF) => {
        const handle = await guard(processId).acquire(force);
        handles.push(handle);
        return handle;
    };

    const writeLock = (contents: string) => {
        fs.writeFileSync(lockFile, contents);
    };

    const lockOwner = (): unknown => JSON.parse(fs.readFileSync(lockFile, "utf8")).ownerProcessId;

    beforeEach(() => {
        dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "lock-"));
        lockFile = path.join(dataDir, "daemon.lock");
        alive = new Set([SELF]);
        handles = [];
        processControl = {
            isAlive: (pid) => alive.has(pid),
            signal: jest.fn<void, [number, NodeJS.Signals]>(),
        };
    });

    afterEach(async () => {
        for (const handle of handles) {
            await handle.release();
        }
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    it("creates the lock with this process as owner", async () => {
        const handle = await acquire();

        expect(handle.record.ownerProcessId).toBe(SELF);
        expect(lockOwner()).toBe(SELF);
        expect(fs.readdirSync(dataDir)).toEqual(["daemon.lock"]);
    });

    it("removes the lock on release", async () => {
        const handle = await acquire();

        await handle.release();
        await handle.release();

        expect(fs.existsSync(lockFile)).toBe(false);
    });

    it("refuses to start while another live instance holds the lock", async () => {
        alive.add(OTHER);
        await acquire(false, OTHER);

        await expect(guard().acquire()).rejects.toMatchObject({
            code: ErrorCode.ALREADY_RUNNING,
            details: { ownerProcessId: OTHER },
        });
        expect(lockOwner()).toBe(OTHER);
        expect(processControl.signal).not.toHaveBeenCalled();
    });

    it("reclaims a lock whose owner is gone", async () => {
        writeLock(JSON.stringify({ ownerProcessId: 3333, acquiredAt: "2024-01-01T00:00:00.000Z" }));

        await acquire();

        expect(lockOwner()).toBe(SELF);
    });

    it("reclaims an unreadable lock", async () => {
        writeLock("garbage");

        await acquire();

        expect(lockOwner()).toBe(SELF);
    });

    it("terminates the running instance on a forced start", async () => {
        alive.add(OTHER);
        writeLock(JSON.stringify({ ownerProcessId: OTHER, acquiredAt: "2024-01-01T00:00:00.000Z" }));
        processControl.signal.mockImplementation((pid) => {
            alive.delete(pid);
        });

        await acquire(true);

        expect(processControl.signal.mock.calls).toEqual([[OTHER, "SIGTERM"]]);
        expect(lockOwner()).toBe(SELF);
    });

    it("escalates to SIGKILL when SIGTERM is ignored", async () => {
        alive.add(OTHER);
        writeLock(JSON.stringify({ ownerProcessId: OTHER, acquiredAt: "2024-01-01T00:00:00.000Z" }));
        processControl.signal.mockImplementation((pid, signal) => {
            if (signal === "SIGKILL") alive.delete(pid);
        });

        await acquire(true);

        expect(processControl.signal.mock.calls).toEqual([
            [OTHER, "SIGTERM"],
            [OTHER, "SIGKILL"],
        ]);
        expect(lockOwner()).toBe(SELF);
    });

    it("gives up when the running instance survives SIGKILL", async () => {
        alive.add(OTHER);
        writeLock(JSON.stringify({ ownerProcessId: OTHER, acquiredAt: "2024-01-01T00:00:00.000Z" }));

        await expect(guard().acquire(true)).rejects.toMatchObject({
            code: ErrorCode.ALREADY_RUNNING,
        });
        expect(lockOwner()).toBe(OTHER);
    });

    it("leaves a lock alone on release once another process owns it", async () => {
        const handle = await acquire();
        writeLock(JSON.stringify({ ownerProcessId: OTHER, acquiredAt: "2024-01-01T00:00:00.000Z" }));

        await handle.release();

        expect(lockOwner()).toBe(OTHER);
    });
});
