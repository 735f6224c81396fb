import { ResourceResolver } from "../library/Classes/resourceResolver.ts";
import { ResourceTree } from "../library/Classes/resourceTree.ts";
import { comparePaths } from "../library/Helpers/fs.ts";
import { formatIdentifier } from "../library/Helpers/identifier.ts";
import type { ConversionReport } from "../library/Classes/conversionReport.ts";
import type { ConversionOptions, TargetFormat } from "../library/Types/Converter/index.ts";
import type { ItemModelDescriptor, JsonObject, ModelDescriptor } from "../library/Types/ItemModel/Details/details.ts";
import type { ItemDefinition } from "../library/Types/ItemModel/index.ts";
import { classifyTree } from "./classifier.ts";
import { validateReferences } from "./references.ts";
import { parseItemDefinition, startRun } from "./shared.ts";

interface TargetEncoding {
    encode(definition: ItemDefinition): ItemModelDescriptor;
}

function modelDescriptor(model: string): ModelDescriptor {
    return { type: "minecraft:model", model };
}

// Item definition encodings, both read by 1.21.4 and later.
const TARGET_ENCODINGS: Record<TargetFormat, TargetEncoding> = {
    range_dispatch: {
        encode: definition => ({
            type: "minecraft:range_dispatch",
            property: "minecraft:custom_model_data",
            index: 0,
            fallback: modelDescriptor(formatIdentifier(definition.identifier)),
            entries: definition.overrides.map(override => ({
                threshold: override.customModelDataValue,
                model: modelDescriptor(formatIdentifier(override.modelReference)),
            })),
        }),
    },
    select: {
        encode: definition => ({
            type: "minecraft:select",
            property: "minecraft:custom_model_data",
            index: 0,
            fallback: modelDescriptor(formatIdentifier(definition.identifier)),
            cases: definition.overrides.map(override => ({
                when: String(override.customModelDataValue),
                model: modelDescriptor(formatIdentifier(override.modelReference)),
            })),
        }),
    },
};

/**
 * Custom Model Data Converter
 * Rewrites every legacy item model in place: its predicate overrides become a `model`
 * descriptor in the target encoding. Referenced models are left where they are.
 */
async function convertCustomModelData(inputDir: string, outputDir: string, options: ConversionOptions = {}): Promise<ConversionReport> {
    const { config, tracker, report } = startRun(options);
    const encoding = TARGET_ENCODINGS[config.targetFormat];

    const tree = await ResourceTree.load(inputDir, config.ignoredFiles);
    const assets = classifyTree(tree, report).sort((a, b) => comparePaths(a.path, b.path));
    const resolver = new ResourceResolver(tree, config.externalNamespaces);
    const output = tree.clone();
    const rewritten: string[] = [];

    tracker.begin("Processing files...", assets.length);
    for (const asset of assets) {
        tracker.checkpoint();
        report.scanned();

        if (asset.category === "legacyItemDefinition") {
            const definition = parseItemDefinition(asset, resolver, report);
            const converted: JsonObject = { ...definition.base, model: encoding.encode(definition) };
            output.setJson(asset.path, converted);
            rewritten.push(asset.path);
            report.rewritten();
        } else {
            report.skipped();
        }
        tracker.advance();
    }

    validateReferences(output, { externalNamespaces: config.externalNamespaces, paths: rewritten });
    await output.write(outputDir, tracker);
    return report.freeze();
}

export { convertCustomModelData, TARGET_ENCODINGS };
export type { TargetEncoding };
