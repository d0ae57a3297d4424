import { promises as fsPromises } from "fs";
import type { FileHandle } from "fs/promises";
import * as path from "path";
import * as crypto from "crypto";
import { createLogger } from "./logger";
import { isErrnoException } from "./errors";

const log = createLogger("AtomicFile");

function temporaryPathFor(target: string): string {
    const suffix = crypto.randomBytes(4).toString("hex");
    return path.join(
        path.dirname(target),
        `.${path.basename(target)}.${process.pid}.${suffix}.tmp`
    );
}

/**
 * Writes `contents` next to `target` and renames it into place, so readers
 * only ever observe the previous file or the complete new one. The temp file
 * is removed on every failure path.
 */
export async function writeFileAtomic(
    target: string,
    contents: string
): Promise<void> {
    await fsPromises.mkdir(path.dirname(target), { recursive: true });
    const tempPath = temporaryPathFor(target);
    let handle: FileHandle | null = null;
    let renamed = false;

    try {
        handle = await fsPromises.open(tempPath, "w");
        await handle.writeFile(contents, "utf8");
        await handle.sync();
        await handle.close();
        handle = null;
        await fsPromises.rename(tempPath, target);
        renamed = true;
    } finally {
        if (handle) {
            await handle.close().catch((error: unknown) => {
                log.debug(`Failed to close temp file ${tempPath}`, error);
            });
        }
        if (!renamed) {
            await fsPromises.rm(tempPath, { force: true }).catch((error: unknown) => {
                log.warn(`Failed to remove temp file ${tempPath}`, error);
            });
        }
    }
}

export async function writeJsonAtomic(target: string, value: unknown): Promise<void> {
    await writeFileAtomic(target, `${JSON.stringify(value, null, 2)}\n`);
}

export type JsonReadResult =
    | { status: "missing" }
    | { status: "invalid"; error: Error }
    | { status: "ok"; value: unknown };

/**
 * Reads and parses a JSON file, distinguishing "absent" from "unparseable".
 * Other I/O errors propagate.
 */
export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
    let raw: string;
    try {
        raw = await fsPromises.readFile(filePath, "utf8");
    } catch (error) {
        if (isErrnoException(error) && error.code === "ENOENT") {
            return { status: "missing" };
        }
        throw error;
    }

    try {
        const value: unknown = JSON.parse(raw);
        return { status: "ok", value };
    } catch (error) {
        return {
            status: "invalid",
            error: error instanceof Error ? error : new Error(String(error)),
        };
    }
}
