import fse from "fs-extra";
import { rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { configure, Uint8ArrayReader, Uint8ArrayWriter, ZipWriter } from "@zip.js/zip.js";
import { ProgressTracker } from "../library/Classes/progressTracker.ts";
import { ResourceTree } from "../library/Classes/resourceTree.ts";
import { ConversionError, IOFailure } from "../library/Errors/index.ts";
import type { ConversionOptions } from "../library/Types/Converter/index.ts";

configure({ useWebWorkers: false });

// Earliest DOS date; entries carry no real timestamp.
const FIXED_DATE = new Date(1980, 0, 1, 0, 0, 0);
const COMPRESSION_LEVEL = 6;

/**
 * Zip the tree at outputDir into destination. Entries are sorted and carry fixed
 * metadata, so the same tree always yields the same bytes.
 */
async function buildArchive(outputDir: string, destination: string, options: ConversionOptions = {}): Promise<string> {
    const tracker = ProgressTracker.from(options);
    const tree = await ResourceTree.load(outputDir);
    const paths = tree.sortedPaths();
    const tempPath = `${destination}.${process.pid}.tmp`;

    tracker.begin("Compressing files...", paths.length);
    try {
        const writer = new ZipWriter(new Uint8ArrayWriter(), {
            lastModDate: FIXED_DATE,
            extendedTimestamp: false,
            level: COMPRESSION_LEVEL,
        });
        for (const path of paths) {
            tracker.checkpoint();
            const data = tree.get(path) ?? new Uint8Array();
            await writer.add(path, new Uint8ArrayReader(data), {
                lastModDate: FIXED_DATE,
                extendedTimestamp: false,
                level: COMPRESSION_LEVEL,
            });
            tracker.advance();
        }
        const archive = await writer.close();

        await fse.ensureDir(dirname(destination));
        await writeFile(tempPath, archive);
        await rename(tempPath, destination);
    } catch (err) {
        await fse.remove(tempPath).catch(() => undefined);
        if (err instanceof ConversionError) throw err;
        throw new IOFailure(destination, "write archive", err);
    }
    return destination;
}

export { buildArchive };
