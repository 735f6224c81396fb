import fse from "fs-extra";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { IOFailure, ParseError, describeError } from "../Errors/index.ts";
import { walkFiles, writeFileAtomic } from "../Helpers/fs.ts";
import { encodeJson, parseJson } from "../Helpers/json.ts";
import type { JsonValue } from "../Types/ItemModel/Details/details.ts";
import type { ProgressTracker } from "./progressTracker.ts";

/**
 * In-memory resource pack: relative path -> file bytes.
 * Insertion order is walk order; anything that affects output iterates sortedPaths().
 */
class ResourceTree {
    private readonly files = new Map<string, Uint8Array>();

    public static async load(root: string, ignoredFiles: readonly string[] = []): Promise<ResourceTree> {
        const tree = new ResourceTree();
        try {
            for await (const file of walkFiles(root, ignoredFiles)) {
                tree.files.set(file.relativePath, await readFile(file.absolutePath));
            }
        } catch (err) {
            throw new IOFailure(root, "read pack folder", err);
        }
        return tree;
    }

    public get size(): number {
        return this.files.size;
    }

    public has(path: string): boolean {
        return this.files.has(path);
    }

    public get(path: string): Uint8Array | undefined {
        return this.files.get(path);
    }

    public set(path: string, data: Uint8Array): void {
        this.files.set(path, data);
    }

    public setJson(path: string, value: JsonValue): void {
        this.files.set(path, encodeJson(path, value));
    }

    /**
     * Parsed JSON at path, undefined when absent. Malformed content raises ParseError.
     */
    public readJson(path: string): JsonValue | undefined {
        const data = this.files.get(path);
        if (data === undefined) return undefined;
        try {
            return parseJson(data);
        } catch (err) {
            throw new ParseError(path, describeError(err));
        }
    }

    public delete(path: string): boolean {
        return this.files.delete(path);
    }

    public paths(): string[] {
        return [...this.files.keys()];
    }

    public sortedPaths(): string[] {
        return this.paths().sort();
    }

    public clone(): ResourceTree {
        const copy = new ResourceTree();
        for (const [path, data] of this.files) copy.files.set(path, data);
        return copy;
    }

    /**
     * Replace the contents of root with this tree.
     */
    public async write(root: string, tracker?: ProgressTracker): Promise<void> {
        try {
            await fse.emptyDir(root);
        } catch (err) {
            throw new IOFailure(root, "prepare output folder", err);
        }

        const paths = this.sortedPaths();
        tracker?.begin("Writing files...", paths.length);
        for (const path of paths) {
            tracker?.checkpoint();
            const data = this.files.get(path);
            if (data) await writeFileAtomic(join(root, path), data);
            tracker?.advance();
        }
    }

    /**
     * Bring root from `previous` to this tree: changed files are replaced one by one,
     * files missing from this tree are deleted last.
     * Cancellation is not polled here; a started flush always runs to the end.
     */
    public async flush(root: string, previous: ResourceTree, tracker?: ProgressTracker): Promise<void> {
        const changed = this.sortedPaths().filter(path => !sameBytes(previous.get(path), this.files.get(path)));
        const removed = previous.sortedPaths().filter(path => !this.files.has(path));

        tracker?.begin("Moving files...", changed.length + removed.length);
        for (const path of changed) {
            const data = this.files.get(path);
            if (data) await writeFileAtomic(join(root, path), data);
            tracker?.advance();
        }
        for (const path of removed) {
            try {
                await fse.remove(join(root, path));
            } catch (err) {
                throw new IOFailure(path, "remove", err);
            }
            tracker?.advance();
        }
    }
}

function sameBytes(a: Uint8Array | undefined, b: Uint8Array | undefined): boolean {
    if (a === undefined || b === undefined) return a === b;
    return Buffer.compare(a, b) === 0;
}

export { ResourceTree };
