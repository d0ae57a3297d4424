import fsPromises from "fs/promises";
import os from "os";
import path from "path";
import vm from "vm";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    errorMessage,
    isAppError,
    isErrnoException,
} from "../errors";

describe("errors", () => {
    it("serialises an AppError with its code and details", () => {
        const error = new AppError(ErrorCode.INVALID_TRACK, ErrorCategory.RECOVERABLE, "Track 200 is not available", {
            trackNumber: 200,
        });

        expect(error).toBeInstanceOf(Error);
        expect(error.toJSON()).toEqual({
            name: "AppError",
            code: "INVALID_TRACK",
            category: "RECOVERABLE",
            message: "Track 200 is not available",
            details: { trackNumber: 200 },
        });
    });

    it("matches AppErrors by code", () => {
        const error = new AppError(ErrorCode.SINK_FAILURE, ErrorCategory.TRANSIENT, "gone");

        expect(isAppError(error)).toBe(true);
        expect(isAppError(error, ErrorCode.SINK_FAILURE)).toBe(true);
        expect(isAppError(error, ErrorCode.MEDIA_UNREADABLE)).toBe(false);
        expect(isAppError(new Error("plain"))).toBe(false);
    });

    it("recognises errno exceptions", () => {
        const errno = Object.assign(new Error("no such file"), { code: "ENOENT" });

        expect(isErrnoException(errno)).toBe(true);
        expect(isErrnoException(new Error("plain"))).toBe(false);
        expect(isErrnoException({ code: 404 })).toBe(false);
        expect(isErrnoException(null)).toBe(false);
    });

    it("recognises errors raised by the fs bindings", async () => {
        const missing = path.join(os.tmpdir(), `missing-${process.pid}-${Date.now()}.json`);
        const error: unknown = await fsPromises.readFile(missing).catch((caught: unknown) => caught);

        expect(isErrnoException(error)).toBe(true);
        expect(isErrnoException(error) && error.code).toBe("ENOENT");
    });

    it("recognises errors created in another context", () => {
        const foreign: unknown = vm.runInNewContext(
            'Object.assign(new Error("lock exists"), { code: "EEXIST" })'
        );

        expect(isErrnoException(foreign)).toBe(true);
        expect(errorMessage(foreign)).toBe("lock exists");
    });

    it("extracts a message from anything thrown", () => {
        expect(errorMessage(new Error("boom"))).toBe("boom");
        expect(errorMessage("text")).toBe("text");
        expect(errorMessage(404)).toBe("404");
    });
});
