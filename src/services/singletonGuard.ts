import * as fs from "fs";
import { promises as fsPromises } from "fs";
import * as path from "path";
import * as crypto from "crypto";
import { z } from "zod";
import { createLogger } from "../utils/logger";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    errorMessage,
    isErrnoException,
} from "../utils/errors";
import { waitFor } from "../utils/async";

const log = createLogger("SingletonGuard");

const DEFAULT_TAKEOVER_TIMEOUT_MS = 5_000;
const DEFAULT_POLL_INTERVAL_MS = 100;
const MAX_ACQUIRE_ATTEMPTS = 5;

const instanceLockSchema = z.object({
    ownerProcessId: z.number().int().positive(),
    acquiredAt: z.string(),
});

export type InstanceLockRecord = z.infer<typeof instanceLockSchema>;

/** The two process operations the guard needs; swapped out in tests. */
export interface ProcessControl {
    isAlive(pid: number): boolean;
    signal(pid: number, signal: NodeJS.Signals): void;
}

export const nodeProcessControl: ProcessControl = {
    isAlive(pid: number): boolean {
        try {
            process.kill(pid, 0);
            return true;
        } catch (error) {
            // EPERM: the process exists but belongs to someone else.
            return isErrnoException(error) && error.code === "EPERM";
        }
    },
    signal(pid: number, signal: NodeJS.Signals): void {
        process.kill(pid, signal);
    },
};

export interface SingletonGuardOptions {
    lockFile: string;
    processId?: number;
    processControl?: ProcessControl;
    takeoverTimeoutMs?: number;
    pollIntervalMs?: number;
}

type LockInspection =
    | { status: "missing" }
    | { status: "unreadable" }
    | { status: "held"; record: InstanceLockRecord };

function alreadyRunning(ownerProcessId: number, message: string): AppError {
    return new AppError(
        ErrorCode.ALREADY_RUNNING,
        ErrorCategory.FATAL,
        message,
        { ownerProcessId }
    );
}

/**
 * Proof of ownership of the instance lock. Released explicitly on shutdown,
 * or synchronously when the process exits normally.
 */
export class ExclusiveHandle {
    private released = false;
    private readonly exitListener = () => this.releaseSync();

    constructor(
        readonly lockFile: string,
        readonly record: InstanceLockRecord
    ) {
        process.once("exit", this.exitListener);
    }

    async release(): Promise<void> {
        if (this.released) return;
        this.released = true;
        process.removeListener("exit", this.exitListener);

        const current = await readLockRecord(this.lockFile);
        if (current.status !== "held" || current.record.ownerProcessId !== this.record.ownerProcessId) {
            log.warn("Lock no longer owned by this process; leaving it in place", {
                lockFile: this.lockFile,
                ownerProcessId: current.status === "held" ? current.record.ownerProcessId : null,
            });
            return;
        }

        await removeLockFile(this.lockFile);
        log.info("Instance lock released", { lockFile: this.lockFile });
    }

    private releaseSync(): void {
        if (this.released) return;
        this.released = true;
        try {
            const raw = fs.readFileSync(this.lockFile, "utf8");
            const parsed = instanceLockSchema.safeParse(JSON.parse(raw));
            if (parsed.success && parsed.data.ownerProcessId === this.record.ownerProcessId) {
                fs.unlinkSync(this.lockFile);
            }
        } catch (error) {
            // Nothing left to do at exit; the next start-up reclaims a stale lock.
            log.debug("Lock release at exit failed", error);
        }
    }
}

async function readLockRecord(lockFile: string): Promise<LockInspection> {
    let raw: string;
    try {
        raw = await fsPromises.readFile(lockFile, "utf8");
    } catch (error) {
        if (isErrnoException(error) && error.code === "ENOENT") {
            return { status: "missing" };
        }
        throw error;
    }

    try {
        const parsed = instanceLockSchema.safeParse(JSON.parse(raw));
        return parsed.success ? { status: "held", record: parsed.data } : { status: "unreadable" };
    } catch {
        return { status: "unreadable" };
    }
}

async function removeLockFile(lockFile: string): Promise<void> {
    try {
        await fsPromises.unlink(lockFile);
    } catch (error) {
        if (!(isErrnoException(error) && error.code === "ENOENT")) {
            throw error;
        }
    }
}

/**
 * Ensures a single daemon drives the output sink. The lock is a JSON record
 * `{ ownerProcessId, acquiredAt }`; a lock whose owner is gone is stale and
 * reclaimed.
 */
export class SingletonGuard {
    private readonly lockFile: string;
    private readonly processId: number;
    private readonly processControl: ProcessControl;
    private readonly takeoverTimeoutMs: number;
    private readonly pollIntervalMs: number;

    constructor(options: SingletonGuardOptions) {
        this.lockFile = path.resolve(options.lockFile);
        this.processId = options.processId ?? process.pid;
        this.processControl = options.processControl ?? nodeProcessControl;
        this.takeoverTimeoutMs = options.takeoverTimeoutMs ?? DEFAULT_TAKEOVER_TIMEOUT_MS;
        this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    }

    /**
     * Acquires the instance lock. Throws ALREADY_RUNNING when a live owner
     * holds it and `force` is false, or when a forced takeover cannot
     * terminate the owner.
     */
    async acquire(force = false): Promise<ExclusiveHandle> {
        for (let attempt = 1; attempt <= MAX_ACQUIRE_ATTEMPTS; attempt++) {
            const record: InstanceLockRecord = {
                ownerProcessId: this.processId,
                acquiredAt: new Date().toISOString(),
            };

            if (await this.tryCreate(record)) {
                log.info("Instance lock acquired", {
                    lockFile: this.lockFile,
                    pid: this.processId,
                });
                return new ExclusiveHandle(this.lockFile, record);
            }

            const existing = await readLockRecord(this.lockFile);
            if (existing.status === "missing") {
                continue;
            }

            if (existing.status === "unreadable") {
                log.warn("Removing unreadable instance lock", {
                    code: ErrorCode.LOCK_STALE,
                    lockFile: this.lockFile,
                });
                await removeLockFile(this.lockFile);
                continue;
            }

            const ownerPid = existing.record.ownerProcessId;
            if (ownerPid === this.processId || !this.processControl.isAlive(ownerPid)) {
                log.warn("Reclaiming stale instance lock", {
                    code: ErrorCode.LOCK_STALE,
                    lockFile: this.lockFile,
                    ownerProcessId: ownerPid,
                    acquiredAt: existing.record.acquiredAt,
                });
                await removeLockFile(this.lockFile);
                continue;
            }

            if (!force) {
                throw alreadyRunning(
                    ownerPid,
                    `Another instance is already running (pid ${ownerPid})`
                );
            }

            await this.terminateOwner(ownerPid);
            await removeLockFile(this.lockFile);
        }

        const current = await readLockRecord(this.lockFile);
        throw alreadyRunning(
            current.status === "held" ? current.record.ownerProcessId : 0,
            `Could not acquire instance lock after ${MAX_ACQUIRE_ATTEMPTS} attempts`
        );
    }

    /**
     * Creates the lock atomically: the record is written to a private temp
     * file, then hard-linked onto the lock path, which fails if it exists.
     */
    private async tryCreate(record: InstanceLockRecord): Promise<boolean> {
        await fsPromises.mkdir(path.dirname(this.lockFile), { recursive: true });
        const tempPath = `${this.lockFile}.${this.processId}.${crypto.randomBytes(4).toString("hex")}`;
        await fsPromises.writeFile(tempPath, JSON.stringify(record), { flag: "wx" });

        try {
            await fsPromises.link(tempPath, this.lockFile);
            return true;
        } catch (error) {
            if (isErrnoException(error) && error.code === "EEXIST") {
                return false;
            }
            throw error;
        } finally {
            await fsPromises.rm(tempPath, { force: true });
        }
    }

    private async terminateOwner(ownerPid: number): Promise<void> {
        log.warn(`Force takeover: terminating running instance (pid ${ownerPid})`);

        for (const signal of ["SIGTERM", "SIGKILL"] as const) {
            try {
                this.processControl.signal(ownerPid, signal);
            } catch (error) {
                if (isErrnoException(error) && error.code === "ESRCH") {
                    return;
                }
                throw alreadyRunning(
                    ownerPid,
                    `Cannot signal running instance (pid ${ownerPid}): ${errorMessage(error)}`
                );
            }

            const exited = await waitFor(
                () => !this.processControl.isAlive(ownerPid),
                this.takeoverTimeoutMs,
                this.pollIntervalMs
            );
            if (exited) {
                log.info(`Previous instance exited after ${signal}`, { ownerProcessId: ownerPid });
                return;
            }
            log.warn(`Previous instance still alive after ${signal}`, { ownerProcessId: ownerPid });
        }

        throw alreadyRunning(
            ownerPid,
            `Running instance (pid ${ownerPid}) did not exit after SIGKILL`
        );
    }
}
