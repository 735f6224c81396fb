import type { LayoutRule, TargetFormat } from "../Converter/index.ts";

interface Config {
    targetFormat: TargetFormat; /* Item definition encoding produced by custom model data conversion. */
    outputDir: string; /* Folder converted archives are written to. */
    archivePrefix: string; /* File name prefix of converted archives, followed by a timestamp. */
    externalNamespaces: string[]; /* Namespaces whose missing assets are provided by the game itself. */
    ignoredFiles: string[]; /* Relative path prefixes skipped when reading a pack. */
    layout: LayoutRule[]; /* Extra model folder relocations applied by the folder structure normalizer. */
}

export type { Config };
