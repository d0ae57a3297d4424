import fs from "fs";
import os from "os";
import path from "path";
import { readJsonFile, writeFileAtomic, writeJsonAtomic } from "../atomicFile";

describe("atomicFile", () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "atomic-"));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("replaces the target and leaves no temp files behind", async () => {
        const target = path.join(dir, "sub", "state.json");

        await writeFileAtomic(target, "first");
        await writeFileAtomic(target, "second");

        expect(fs.readFileSync(target, "utf8")).toBe("second");
        expect(fs.readdirSync(path.dirname(target))).toEqual(["state.json"]);
    });

    it("writes pretty JSON with a trailing newline", async () => {
        const target = path.join(dir, "value.json");

        await writeJsonAtomic(target, { trackNumber: 3 });

        expect(fs.readFileSync(target, "utf8")).toBe('{\n  "trackNumber": 3\n}\n');
    });

    it("cleans up the temp file when the rename fails", async () => {
        const target = path.join(dir, "occupied");
        fs.mkdirSync(path.join(target, "child"), { recursive: true });

        await expect(writeFileAtomic(target, "data")).rejects.toThrow();

        expect(fs.readdirSync(dir)).toEqual(["occupied"]);
    });

    it("distinguishes missing, invalid and valid files", async () => {
        const file = path.join(dir, "data.json");

        await expect(readJsonFile(file)).resolves.toEqual({ status: "missing" });

        fs.writeFileSync(file, "{oops");
        await expect(readJsonFile(file)).resolves.toMatchObject({ status: "invalid" });

        fs.writeFileSync(file, '{"a":1}');
        await expect(readJsonFile(file)).resolves.toEqual({ status: "ok", value: { a: 1 } });
    });
});
