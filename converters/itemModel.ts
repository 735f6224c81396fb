import { ResourceResolver } from "../library/Classes/resourceResolver.ts";
import { ResourceTree } from "../library/Classes/resourceTree.ts";
import type { ConversionReport } from "../library/Classes/conversionReport.ts";
import { DuplicateVariantError } from "../library/Errors/index.ts";
import { comparePaths } from "../library/Helpers/fs.ts";
import { assetPath, formatIdentifier } from "../library/Helpers/identifier.ts";
import { isJsonObject, omitKeys } from "../library/Helpers/json.ts";
import type { ConversionOptions } from "../library/Types/Converter/index.ts";
import type { ItemDefinitionFile, JsonObject, JsonValue, ModelDescriptor, SelectDescriptor } from "../library/Types/ItemModel/Details/details.ts";
import type { ItemDefinition, PredicateOverride } from "../library/Types/ItemModel/index.ts";
import type { ResourceIdentifier } from "../library/Types/Resource/identifier.ts";
import { classifyTree } from "./classifier.ts";
import { validateReferences } from "./references.ts";
import { legacyIdentity, overrideLocation, parseItemDefinition, startRun } from "./shared.ts";

// Model fields merged key by key instead of replaced.
const MERGED_KEYS = ["textures", "display"];

function modelDescriptor(identifier: ResourceIdentifier): ModelDescriptor {
    return { type: "minecraft:model", model: formatIdentifier(identifier) };
}

function variantIdentifier(definition: ItemDefinition, value: number): ResourceIdentifier {
    return { namespace: definition.identifier.namespace, path: `item/${definition.name}_${value}` };
}

function descriptorIdentifier(definition: ItemDefinition, value?: number): ResourceIdentifier {
    const name = value === undefined ? definition.name : `${definition.name}_${value}`;
    return { namespace: definition.identifier.namespace, path: name };
}

/**
 * Flatten a variant: base fields first, then the override model's fields on top.
 */
function mergeVariant(base: JsonObject, override: JsonObject): JsonObject {
    const variant: JsonObject = { ...base };
    for (const [key, value] of Object.entries(omitKeys(override, ["overrides"]))) {
        const current = variant[key];
        variant[key] = MERGED_KEYS.includes(key) && isJsonObject(current) && isJsonObject(value)
            ? { ...current, ...value }
            : value;
    }
    return variant;
}

/**
 * Root definition selecting between the variants of one item.
 */
function rootDefinition(definition: ItemDefinition): ItemDefinitionFile {
    const model: SelectDescriptor = {
        type: "minecraft:select",
        property: "minecraft:custom_model_data",
        index: 0,
        fallback: modelDescriptor(definition.identifier),
        cases: definition.overrides.map(override => ({
            when: String(override.customModelDataValue),
            model: modelDescriptor(variantIdentifier(definition, override.customModelDataValue)),
        })),
    };
    return { model };
}

/**
 * Tracks which source produced each output path, so no path is written twice.
 */
class VariantClaims {
    private readonly owners = new Map<string, string>();

    constructor(private readonly input: ResourceTree) {}

    public reserve(path: string, source: string): void {
        this.owners.set(path, source);
    }

    /**
     * Claim an output path. `replaceable` is the input file this claim may overwrite.
     */
    public claim(path: string, identifier: ResourceIdentifier, source: string, replaceable?: string): void {
        const owner = this.owners.get(path);
        if (owner !== undefined) throw new DuplicateVariantError(formatIdentifier(identifier), owner, source);
        if (this.input.has(path) && path !== replaceable) throw new DuplicateVariantError(formatIdentifier(identifier), path, source);
        this.owners.set(path, source);
    }
}

/**
 * Item Model Converter
 * Expands every legacy item model into standalone variants, each addressable through
 * its own item definition, plus a root definition dispatching on custom model data.
 */
async function convertItemModel(inputDir: string, outputDir: string, options: ConversionOptions = {}): Promise<ConversionReport> {
    const { config, tracker, report } = startRun(options);

    const tree = await ResourceTree.load(inputDir, config.ignoredFiles);
    const assets = classifyTree(tree, report).sort((a, b) => comparePaths(a.path, b.path));
    const documents = new Map<string, JsonValue>();
    for (const asset of assets) if (asset.data !== undefined) documents.set(asset.path, asset.data);

    const resolver = new ResourceResolver(tree, config.externalNamespaces);
    const output = tree.clone();
    const written: string[] = [];
    const claims = new VariantClaims(tree);

    const definitions = new Map<string, ItemDefinition>();
    for (const asset of assets) {
        const identity = legacyIdentity(asset.path);
        if (asset.category !== "legacyItemDefinition" || !identity) continue;
        const duplicate = (value: number, first: string, second: string) => {
            const variant = { namespace: identity.namespace, path: `item/${identity.name}_${value}` };
            return new DuplicateVariantError(formatIdentifier(variant), first, second);
        };
        definitions.set(asset.path, parseItemDefinition(asset, resolver, report, duplicate));
    }

    // Base models and root definitions belong to their legacy file.
    for (const definition of definitions.values()) {
        claims.reserve(definition.path, definition.path);
        const rootPath = assetPath(descriptorIdentifier(definition), "itemDefinition");
        claims.claim(rootPath, descriptorIdentifier(definition), definition.path);
    }

    const write = (path: string, value: JsonValue) => {
        output.setJson(path, value);
        written.push(path);
        report.rewritten();
    };

    tracker.begin("Processing files...", assets.length);
    for (const asset of assets) {
        tracker.checkpoint();
        report.scanned();

        const definition = definitions.get(asset.path);
        if (!definition) {
            report.skipped();
            tracker.advance();
            continue;
        }

        write(definition.path, definition.base);
        for (const override of definition.overrides) {
            const variant = materializeVariant(definition, override, documents, resolver);
            const location = overrideLocation(definition.path, override.index);
            const variantId = variantIdentifier(definition, override.customModelDataValue);
            const variantPath = assetPath(variantId, "model");
            const descriptorId = descriptorIdentifier(definition, override.customModelDataValue);
            const descriptorPath = assetPath(descriptorId, "itemDefinition");

            claims.claim(variantPath, variantId, location, assetPath(override.modelReference, "model"));
            claims.claim(descriptorPath, variantId, location);

            write(variantPath, variant);
            const descriptor: ItemDefinitionFile = { model: modelDescriptor(variantId) };
            write(descriptorPath, descriptor);
        }
        write(assetPath(descriptorIdentifier(definition), "itemDefinition"), rootDefinition(definition));
        report.variants(definition.overrides.length + 1);
        tracker.advance();
    }

    validateReferences(output, { externalNamespaces: config.externalNamespaces, paths: written });
    await output.write(outputDir, tracker);
    return report.freeze();
}

/**
 * Standalone model for one override. Models shipped by the game cannot be flattened
 * and are inherited through `parent` instead.
 */
function materializeVariant(
    definition: ItemDefinition,
    override: PredicateOverride,
    documents: Map<string, JsonValue>,
    resolver: ResourceResolver,
): JsonObject {
    const source = documents.get(assetPath(override.modelReference, "model"));
    if (resolver.isInTree(override.modelReference, "model") && isJsonObject(source)) {
        return mergeVariant(definition.base, source);
    }
    return { parent: formatIdentifier(override.modelReference) };
}

export { convertItemModel, mergeVariant };
