import { z } from "zod";
import { ConversionReport } from "../library/Classes/conversionReport.ts";
import { ResourceTree } from "../library/Classes/resourceTree.ts";
import { ParseError } from "../library/Errors/index.ts";
import { isJsonObject } from "../library/Helpers/json.ts";
import type { JsonValue } from "../library/Types/ItemModel/Details/details.ts";

type AssetCategory = "legacyItemDefinition" | "itemDefinition" | "model" | "other";

interface ClassifiedAsset {
    path: string;
    category: AssetCategory;
    data?: JsonValue; // Parsed content of every readable .json file.
}

const LEGACY_DEFINITION_PATH = /^assets\/[^/]+\/models\/item\/[^/]+\.json$/;
const ITEM_DEFINITION_PATH = /^assets\/[^/]+\/items\/.+\.json$/;
const MODEL_PATH = /^assets\/[^/]+\/models\/.+\.json$/;

const MODEL_KEYS = new Set([
    "parent",
    "textures",
    "elements",
    "display",
    "overrides",
    "gui_light",
    "ambientocclusion",
    "texture_size",
]);

// Legacy custom model data is an integer item component.
const customModelDataSchema = z.number().int().safe();

const overridesSchema = z.array(
    z.object({
        predicate: z.record(z.unknown()),
        model: z.string(),
    }),
);

function isModelShaped(data: JsonValue): boolean {
    if (!isJsonObject(data)) return false;
    const keys = Object.keys(data);
    return keys.length === 0 || keys.some(key => MODEL_KEYS.has(key));
}

function hasCustomModelData(overrides: z.infer<typeof overridesSchema>): boolean {
    return overrides.some(override => customModelDataSchema.safeParse(override.predicate.custom_model_data).success);
}

/**
 * Sort one file into its asset category. Problems are recorded on the report and the
 * file falls back to "other", which is copied through untouched.
 */
function classifyAsset(tree: ResourceTree, path: string, report: ConversionReport): ClassifiedAsset {
    if (!path.endsWith(".json")) return { path, category: "other" };

    let data: JsonValue | undefined;
    try {
        data = tree.readJson(path);
    } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        report.problem(path, err.message);
        return { path, category: "other" };
    }
    if (data === undefined) return { path, category: "other" };

    if (LEGACY_DEFINITION_PATH.test(path) && isJsonObject(data) && "overrides" in data) {
        const overrides = overridesSchema.safeParse(data.overrides);
        if (!overrides.success) {
            report.problem(path, `Unreadable overrides: ${overrides.error.issues[0]?.message ?? "invalid shape"}`);
            return { path, category: "other", data };
        }
        // Overrides on vanilla predicates only (bow pulling, compass angle) stay as they are.
        if (hasCustomModelData(overrides.data)) return { path, category: "legacyItemDefinition", data };
    }

    if (ITEM_DEFINITION_PATH.test(path) && isJsonObject(data) && isJsonObject(data.model)) {
        return { path, category: "itemDefinition", data };
    }

    if (MODEL_PATH.test(path) && isModelShaped(data)) return { path, category: "model", data };

    return { path, category: "other", data };
}

/**
 * Classify every file of the tree, in walk order.
 */
function classifyTree(tree: ResourceTree, report: ConversionReport = new ConversionReport()): ClassifiedAsset[] {
    return tree.paths().map(path => classifyAsset(tree, path, report));
}

/**
 * Load a pack folder and classify it.
 */
async function walkPack(dir: string, ignoredFiles: readonly string[] = [], report: ConversionReport = new ConversionReport()) {
    const tree = await ResourceTree.load(dir, ignoredFiles);
    return { tree, assets: classifyTree(tree, report), report };
}

export { classifyAsset, classifyTree, customModelDataSchema, overridesSchema, walkPack };
export type { AssetCategory, ClassifiedAsset };
