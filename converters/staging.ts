import fse from "fs-extra";
import { readdir, readFile, stat } from "node:fs/promises";
import { dirname, join, relative } from "node:path";
import { configure, Uint8ArrayReader, Uint8ArrayWriter, ZipReader } from "@zip.js/zip.js";
import { ProgressTracker } from "../library/Classes/progressTracker.ts";
import { ConversionError, IOFailure, PathSecurityError } from "../library/Errors/index.ts";
import { isHiddenName, toPosixPath } from "../library/Helpers/fs.ts";
import type { ConversionOptions } from "../library/Types/Converter/index.ts";

configure({ useWebWorkers: false });

function isZipBuffer(data: Uint8Array): boolean {
    return data.length >= 4 && data[0] === 0x50 && data[1] === 0x4b;
}

function isVersionControlled(path: string): boolean {
    return path.split("/").includes(".git");
}

/**
 * Normalized entry name. Absolute names, drive letters and ".." segments are rejected.
 */
function safeEntryName(filename: string): string {
    const name = filename.replace(/\\/g, "/");
    if (name.startsWith("/") || /^[a-zA-Z]:/.test(name) || name.split("/").includes("..")) {
        throw new PathSecurityError(filename);
    }
    return name;
}

async function isDirectory(path: string): Promise<boolean> {
    return await stat(path).then(s => s.isDirectory()).catch(() => false);
}

/**
 * Extract a zip into output. Every entry name is checked before the first byte is written.
 */
async function unzipFolder(data: Uint8Array, output: string, tracker: ProgressTracker): Promise<void> {
    const reader = new ZipReader(new Uint8ArrayReader(data));
    try {
        const entries = await reader.getEntries();
        const names = entries.map(entry => safeEntryName(entry.filename));

        tracker.begin("Extracting files...", entries.length);
        for (const [i, entry] of entries.entries()) {
            tracker.checkpoint();
            const name = names[i];
            if (name === undefined || entry.directory || isVersionControlled(name)) {
                tracker.advance();
                continue;
            }
            const fileData = await entry.getData?.(new Uint8ArrayWriter());
            if (fileData === undefined) throw new IOFailure(name, "extract", new Error("entry has no data"));
            const destPath = join(output, name);
            await fse.ensureDir(dirname(destPath));
            await fse.writeFile(destPath, fileData);
            tracker.advance();
        }
    } finally {
        await reader.close();
    }
}

/**
 * The pack root is the staging folder itself, or its only top-level folder when
 * the archive wraps the pack in one.
 */
async function findPackRoot(stagingDir: string): Promise<string> {
    if (await isDirectory(join(stagingDir, "assets"))) return stagingDir;

    const folders = (await readdir(stagingDir, { withFileTypes: true }))
        .filter(entry => entry.isDirectory() && !isHiddenName(entry.name));
    const only = folders.length === 1 ? folders[0] : undefined;
    if (only && await isDirectory(join(stagingDir, only.name, "assets"))) return join(stagingDir, only.name);
    return stagingDir;
}

/**
 * Copy a pack folder, or extract a zipped pack, into stagingDir. Returns the pack root.
 */
async function stageInput(inputPath: string, stagingDir: string, options: ConversionOptions = {}): Promise<string> {
    const tracker = ProgressTracker.from(options);
    try {
        await fse.ensureDir(stagingDir);
        if (await isDirectory(inputPath)) {
            tracker.message("Copying pack folder...");
            await fse.copy(inputPath, stagingDir, {
                filter: src => !isVersionControlled(toPosixPath(relative(inputPath, src))),
            });
        } else {
            const data = await readFile(inputPath);
            if (!isZipBuffer(data)) throw new IOFailure(inputPath, "read pack", new Error("input is neither a folder nor a zip archive"));
            await unzipFolder(data, stagingDir, tracker);
        }
        return await findPackRoot(stagingDir);
    } catch (err) {
        if (err instanceof ConversionError) throw err;
        throw new IOFailure(inputPath, "stage", err);
    }
}

export { findPackRoot, isZipBuffer, safeEntryName, stageInput };
