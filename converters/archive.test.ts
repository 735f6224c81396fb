import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fse from "fs-extra";
import { readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Uint8ArrayReader, Uint8ArrayWriter, ZipReader } from "@zip.js/zip.js";
import { CancellationError, IOFailure } from "../library/Errors/index.ts";
import { makeTempDir, writePack } from "../library/Helpers/testing.ts";
import { buildArchive } from "./archive.ts";

describe("buildArchive", () => {
    let root = "";
    let pack = "";

    beforeEach(async () => {
        root = await makeTempDir();
        pack = join(root, "pack");
        await writePack(pack, {
            "pack.mcmeta": { pack: { pack_format: 34, description: "test" } },
            "assets/b.json": { b: true },
            "assets/a/z.json": { z: true },
            "README.txt": new TextEncoder().encode("hello"),
        });
    });

    afterEach(async () => {
        await fse.remove(root);
    });

    it("produces byte-identical archives for the same tree", async () => {
        const first = await buildArchive(pack, join(root, "first.zip"));
        const second = await buildArchive(pack, join(root, "second.zip"));

        expect(Buffer.compare(await readFile(first), await readFile(second))).toBe(0);
    });

    it("stores sorted file entries with a fixed timestamp", async () => {
        const destination = await buildArchive(pack, join(root, "out", "pack.zip"));

        const reader = new ZipReader(new Uint8ArrayReader(await readFile(destination)));
        const entries = await reader.getEntries();
        const first = entries[0];
        const readme = first && !first.directory ? await first.getData?.(new Uint8ArrayWriter()) : undefined;
        await reader.close();

        expect(entries.map(entry => entry.filename)).toEqual(["README.txt", "assets/a/z.json", "assets/b.json", "pack.mcmeta"]);
        expect(entries.every(entry => !entry.directory)).toBe(true);
        expect(first?.lastModDate.getFullYear()).toBe(1980);
        expect(new TextDecoder().decode(readme)).toBe("hello");
        expect(await readdir(join(root, "out"))).toEqual(["pack.zip"]);
    });

    it("finalizes nothing when cancelled", async () => {
        const destination = join(root, "cancelled.zip");

        await expect(buildArchive(pack, destination, { isCancelled: () => true })).rejects.toBeInstanceOf(CancellationError);
        expect(await fse.pathExists(destination)).toBe(false);
        expect(await fse.pathExists(`${destination}.${process.pid}.tmp`)).toBe(false);
    });

    it("raises IOFailure when the destination cannot be written", async () => {
        await writeFile(join(root, "blocker"), "not a folder");
        const destination = join(root, "blocker", "pack.zip");

        const error = await buildArchive(pack, destination).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(IOFailure);
        expect(error).toMatchObject({ code: "IO_FAILURE", paths: [destination] });
        expect(await readFile(join(root, "blocker"), "utf8")).toBe("not a folder");
    });
});
