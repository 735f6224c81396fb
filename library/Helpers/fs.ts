/**
 * Filesystem helpers shared by the pack reader and writers.
 */
import fse from "fs-extra";
import klaw from "klaw";
import { rename, writeFile } from "node:fs/promises";
import { basename, dirname, relative, sep } from "node:path";
import { IOFailure } from "../Errors/index.ts";

interface WalkedFile {
    absolutePath: string;
    relativePath: string; // Forward-slash separated.
}

const VCS_DIRECTORIES = new Set([".git", ".svn", ".hg"]);

function toPosixPath(path: string): string {
    return path.split(sep).join("/");
}

// Code unit order, independent of locale.
function comparePaths(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function isHiddenName(name: string): boolean {
    return name.startsWith(".") || VCS_DIRECTORIES.has(name);
}

function isIgnored(relativePath: string, ignoredFiles: readonly string[]): boolean {
    return ignoredFiles.some(prefix => {
        const normalized = prefix.replace(/^\.?\/+/, "").replace(/\/+$/, "");
        return normalized.length > 0 && (relativePath === normalized || relativePath.startsWith(`${normalized}/`));
    });
}

/**
 * Walk every regular file under root in sorted order, skipping hidden entries,
 * version-control folders and ignored prefixes.
 */
async function* walkFiles(root: string, ignoredFiles: readonly string[] = []): AsyncGenerator<WalkedFile> {
    const walker = klaw(root, {
        filter: path => !isHiddenName(basename(path)),
        pathSorter: comparePaths,
    });

    for await (const item of walker) {
        if (!item.stats.isFile()) continue;
        const relativePath = toPosixPath(relative(root, item.path));
        if (isIgnored(relativePath, ignoredFiles)) continue;
        yield { absolutePath: item.path, relativePath };
    }
}

/**
 * Write a file by way of a sibling temp file and a rename, so readers never see a partial file.
 */
async function writeFileAtomic(path: string, data: Uint8Array): Promise<void> {
    const tempPath = `${path}.${process.pid}.tmp`;
    try {
        await fse.ensureDir(dirname(path));
        await writeFile(tempPath, data);
        await rename(tempPath, path);
    } catch (err) {
        await fse.remove(tempPath).catch(() => undefined);
        throw new IOFailure(path, "write", err);
    }
}

export { comparePaths, isHiddenName, isIgnored, toPosixPath, walkFiles, writeFileAtomic };
export type { WalkedFile };
