/**
 * Pack fixtures for tests.
 */
import fse from "fs-extra";
import { mkdtemp, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { JsonValue } from "../Types/ItemModel/Details/details.ts";
import { walkFiles } from "./fs.ts";
import { parseJson } from "./json.ts";

type PackFiles = Record<string, JsonValue | Uint8Array>;

const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

async function makeTempDir(prefix = "mcpack_test_"): Promise<string> {
    return await mkdtemp(join(tmpdir(), prefix));
}

async function writePack(root: string, files: PackFiles): Promise<void> {
    for (const [path, content] of Object.entries(files)) {
        const target = join(root, path);
        await fse.ensureDir(dirname(target));
        const data = content instanceof Uint8Array ? content : JSON.stringify(content, null, 2);
        await fse.writeFile(target, data);
    }
}

async function readPackJson(root: string, path: string): Promise<JsonValue> {
    return parseJson(await readFile(join(root, path)));
}

/**
 * Every file under root with its bytes, keyed by sorted relative path.
 */
async function snapshotPack(root: string): Promise<Map<string, Buffer>> {
    const files = new Map<string, Buffer>();
    for await (const file of walkFiles(root)) files.set(file.relativePath, await readFile(file.absolutePath));
    return new Map([...files].sort(([a], [b]) => (a < b ? -1 : 1)));
}

async function listPack(root: string): Promise<string[]> {
    return [...(await snapshotPack(root)).keys()];
}

export { listPack, makeTempDir, PNG_BYTES, readPackJson, snapshotPack, writePack };
export type { PackFiles };
