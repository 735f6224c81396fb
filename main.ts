#!/usr/bin/env -S npx tsx
/**
 * Resource pack migrator.
 * Converts custom_model_data overrides of a pack folder or zip into 1.21.4+ item model definitions.
 */

import consola from "consola";
import fse from "fs-extra";
import { existsSync, realpathSync } from "node:fs";
import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { z } from "zod";
import {
    buildArchive,
    convertCustomModelData,
    convertItemModel,
    normalizeFolderStructure,
    stageInput,
} from "./converters/index.ts";
import type { ConversionReport, Config, ConversionOptions, ProgressSink } from "./library/index.ts";
import { ConfigError, configSchema, DEFAULT_CONFIG, describeError, formatIssues, IOFailure, logProcess } from "./library/index.ts";

// Path Constants
const CONFIG_PATH = "./config.json";

const USAGE = "Usage: resource-pack-migrator <cmd|item> <input> [--output <dir>] [--config <path>] [--format range_dispatch|select]";

const modeSchema = z.enum(["cmd", "item"]);
const formatSchema = z.enum(["range_dispatch", "select"]);

type Mode = z.infer<typeof modeSchema>;

class UsageError extends Error {
    constructor(message: string) {
        super(`${message}\n${USAGE}`);
        this.name = "UsageError";
    }
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Load and validate config.json. A missing file is created with the defaults.
 */
async function loadConfig(path: string = CONFIG_PATH): Promise<Config> {
    let raw: string;
    try {
        raw = await readFile(path, "utf8");
    } catch (err) {
        if (!isNotFound(err)) throw new IOFailure(path, "read config", err);
        const content = JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n";
        await writeFile(path, content);
        logProcess("Config", "yellow", `Created default config at ${path}.`);
        return { ...DEFAULT_CONFIG };
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        throw new ConfigError(path, describeError(err));
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new ConfigError(path, "expected a JSON object");
    }

    const result = configSchema.safeParse({ ...DEFAULT_CONFIG, ...parsed });
    if (!result.success) throw new ConfigError(path, formatIssues(result.error));
    return result.data;
}

/**
 * Progress sink writing phase messages and every quarter of a phase to the log.
 */
function createLogSink(process: string): ProgressSink {
    let lastQuarter = -1;
    return {
        message(text) {
            lastQuarter = -1;
            logProcess(process, "cyan", text);
        },
        report(completed, total) {
            const quarter = total === 0 ? 4 : Math.floor((completed * 4) / total);
            if (quarter === lastQuarter) return;
            lastQuarter = quarter;
            logProcess(process, "gray", `${completed}/${total}`);
        },
    };
}

/**
 * Archive name scheme, e.g. converted_20250101_120000.zip.
 */
function getArchiveName(config: Config, date: Date): string {
    const pad = (value: number) => String(value).padStart(2, "0");
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `${config.archivePrefix}_${day}_${time}.zip`;
}

function printReport(report: ConversionReport): void {
    consola.success(`Scanned ${report.filesScanned} files: ${report.filesRewritten} rewritten, ${report.filesSkipped} copied through.`);
    if (report.variantsGenerated > 0) consola.info(`Generated ${report.variantsGenerated} model variants.`);

    if (report.warnings.length > 0) {
        consola.warn(`Warnings (${report.warnings.length}):`);
        for (const warning of report.warnings) consola.log(`  ${warning}`);
    }

    if (report.problems.length > 0) {
        consola.warn(`Unreadable files (${report.problems.length}):`);
        for (const problem of report.problems) consola.log(`  ${problem.path}: ${problem.message}`);
    }
}

interface RunOptions {
    isCancelled?: () => boolean;
    now?: Date;
}

/**
 * Parse arguments, run the selected pipeline and return the path of the written archive.
 */
async function run(argv: string[] = process.argv.slice(2), options: RunOptions = {}): Promise<string> {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            output: { type: "string", short: "o" },
            config: { type: "string", short: "c" },
            format: { type: "string", short: "f" },
        },
    });

    const [modeArg, input] = positionals;
    const mode = modeSchema.safeParse(modeArg);
    if (!mode.success) throw new UsageError(`Unknown mode "${modeArg ?? ""}".`);
    if (!input) throw new UsageError("Missing input pack.");

    const config = await loadConfig(values.config ?? CONFIG_PATH);
    if (values.output) config.outputDir = values.output;
    if (values.format) {
        const format = formatSchema.safeParse(values.format);
        if (!format.success) throw new UsageError(`Unknown format "${values.format}".`);
        config.targetFormat = format.data;
    }

    const workDir = await mkdtemp(join(tmpdir(), "mcpack_"));
    try {
        return await convertPack(mode.data, resolve(input), workDir, config, options);
    } finally {
        await fse.remove(workDir);
    }
}

async function convertPack(mode: Mode, input: string, workDir: string, config: Config, options: RunOptions): Promise<string> {
    const conversion: ConversionOptions = {
        progress: createLogSink(mode === "cmd" ? "CMD" : "Item"),
        isCancelled: options.isCancelled,
        config,
    };
    const outputDir = join(workDir, "output");

    logProcess("Stage", "cyan", `Staging ${input}...`);
    const packRoot = await stageInput(input, join(workDir, "input"), conversion);

    let report: ConversionReport;
    if (mode === "cmd") {
        report = await convertCustomModelData(packRoot, outputDir, conversion);
        const normalized = await normalizeFolderStructure(outputDir, conversion);
        logProcess("Normalize", "green", `Relocated ${normalized.filesRewritten} files.`);
    } else {
        report = await convertItemModel(packRoot, outputDir, conversion);
    }
    printReport(report);

    const archivePath = resolve(config.outputDir, getArchiveName(config, options.now ?? new Date()));
    await buildArchive(outputDir, archivePath, conversion);
    return archivePath;
}

/**
 * Main entrypoint.
 */
async function main(): Promise<void> {
    let cancelled = false;
    const onInterrupt = () => {
        cancelled = true;
        logProcess("Main", "yellow", "Cancelling after the current file...", console.warn);
    };
    process.once("SIGINT", onInterrupt);

    try {
        const archivePath = await run(process.argv.slice(2), { isCancelled: () => cancelled });
        logProcess("Build", "green", `Conversion successful! Output at: ${archivePath}`);
    } catch (err) {
        logProcess("Error", "red", describeError(err), console.error);
        process.exitCode = 1;
    } finally {
        process.off("SIGINT", onInterrupt);
    }
}

function isMainModule(): boolean {
    const entry = process.argv[1];
    return entry !== undefined && existsSync(entry) && realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
}

export { createLogSink, getArchiveName, loadConfig, logProcess, run };

export default run;

if (isMainModule()) {
    await main();
}
