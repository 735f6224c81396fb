import type { ConversionReport } from "../library/Classes/conversionReport.ts";
import { ReferenceIndex } from "../library/Classes/referenceIndex.ts";
import { ResourceTree } from "../library/Classes/resourceTree.ts";
import { DuplicateVariantError } from "../library/Errors/index.ts";
import { comparePaths } from "../library/Helpers/fs.ts";
import { assetPath, formatIdentifier, identifyPath } from "../library/Helpers/identifier.ts";
import { isJsonObject, omitKeys } from "../library/Helpers/json.ts";
import { visitReferences } from "../library/Helpers/references.ts";
import type { ConversionOptions, LayoutRule } from "../library/Types/Converter/index.ts";
import type { JsonObject, JsonValue } from "../library/Types/ItemModel/Details/details.ts";
import type { ResourceIdentifier } from "../library/Types/Resource/identifier.ts";
import { classifyTree } from "./classifier.ts";
import type { ClassifiedAsset } from "./classifier.ts";
import { validateReferences } from "./references.ts";
import { startRun } from "./shared.ts";

interface DefinitionLayout {
    source: string; // Folder holding converted definitions, relative to assets/<namespace>/.
    target: string; // Folder the game reads item definitions from.
}

// Where 1.21.4 and later read item definitions, for either encoding.
const DEFINITION_LAYOUT: DefinitionLayout = { source: "models/item", target: "items" };

interface SplitDefinition {
    identifier: ResourceIdentifier;
    itemsPath: string;
    definition: JsonObject;
    remainder: JsonObject; // Model fields left behind as the base model.
}

interface ModelMove {
    from: ResourceIdentifier;
    to: ResourceIdentifier;
    path: string;
}

/**
 * Split a converted definition still living in the model folder into its two halves.
 */
function splitDefinition(asset: ClassifiedAsset, layout: DefinitionLayout = DEFINITION_LAYOUT): SplitDefinition | undefined {
    const [root, namespace, ...rest] = asset.path.split("/");
    const data = asset.data;
    if (root !== "assets" || namespace === undefined || !isJsonObject(data) || !isJsonObject(data.model)) return undefined;

    const folder = rest.slice(0, -1).join("/");
    const file = rest[rest.length - 1];
    if (folder !== layout.source || file === undefined || !file.endsWith(".json")) return undefined;

    const name = file.slice(0, -".json".length);
    return {
        identifier: { namespace, path: name },
        itemsPath: `assets/${namespace}/${layout.target}/${file}`,
        definition: { model: data.model },
        remainder: omitKeys(data, ["model"]),
    };
}

/**
 * Model relocation for path under the first matching layout rule.
 */
function planMove(path: string, rules: readonly LayoutRule[]): ModelMove | undefined {
    const asset = identifyPath(path);
    if (!asset || asset.kind !== "model") return undefined;

    const { identifier } = asset;
    const rule = rules.find(r => identifier.path.startsWith(`${r.from}/`));
    if (!rule) return undefined;

    const to = { namespace: identifier.namespace, path: `${rule.to}${identifier.path.slice(rule.from.length)}` };
    return { from: identifier, to, path: assetPath(to, "model") };
}

/**
 * Folder Structure Normalizer
 * Moves converted item definitions to the folder the game reads them from and applies
 * the configured model folder moves, rewriting every reference to a moved model.
 * The result is validated in memory before anything on disk changes.
 */
async function normalizeFolderStructure(outputDir: string, options: ConversionOptions = {}): Promise<ConversionReport> {
    const { config, tracker, report } = startRun(options);

    const previous = await ResourceTree.load(outputDir, config.ignoredFiles);
    const assets = classifyTree(previous, report).sort((a, b) => comparePaths(a.path, b.path));
    const working = previous.clone();
    const documents = new Map<string, JsonValue>();
    const changed = new Set<string>();
    const removed: ResourceIdentifier[] = [];

    const update = (path: string, data: JsonValue) => {
        working.setJson(path, data);
        documents.set(path, data);
        changed.add(path);
    };

    tracker.begin("Processing files...", assets.length);
    for (const asset of assets) {
        tracker.checkpoint();
        report.scanned();

        const split = splitDefinition(asset);
        if (!split) {
            if (asset.data !== undefined) documents.set(asset.path, asset.data);
            report.skipped();
            tracker.advance();
            continue;
        }

        if (previous.has(split.itemsPath)) {
            throw new DuplicateVariantError(formatIdentifier(split.identifier), split.itemsPath, asset.path);
        }
        update(split.itemsPath, split.definition);
        if (Object.keys(split.remainder).length > 0) {
            update(asset.path, split.remainder);
        } else {
            // The fallback now points at the model the game ships.
            working.delete(asset.path);
            documents.delete(asset.path);
            removed.push({ namespace: split.identifier.namespace, path: `item/${split.identifier.path}` });
        }
        tracker.advance();
    }

    const index = ReferenceIndex.build([...documents].map(([path, data]) => ({ path, data })));

    // Plan every move before touching anything.
    const moves = new Map<string, ModelMove>();
    const targets = new Map<string, string>();
    for (const path of working.sortedPaths()) {
        const move = planMove(path, config.layout);
        if (!move) continue;
        const claimant = targets.get(move.path) ?? (working.has(move.path) ? move.path : undefined);
        if (claimant !== undefined) throw new DuplicateVariantError(formatIdentifier(move.to), claimant, path);
        targets.set(move.path, path);
        moves.set(path, move);
    }

    if (moves.size > 0) {
        const renames = new Map<string, ResourceIdentifier>();
        const referencing = new Set<string>();
        for (const move of moves.values()) {
            renames.set(formatIdentifier(move.from), move.to);
            for (const path of index.referencesTo(move.from, "model")) referencing.add(path);
        }

        tracker.begin("Rewriting references...", referencing.size);
        for (const path of [...referencing].sort()) {
            tracker.checkpoint();
            const document = documents.get(path);
            if (document !== undefined) {
                const rewritten = visitReferences(path, document, ref => (ref.kind === "model" ? renames.get(formatIdentifier(ref.identifier)) : undefined));
                update(path, rewritten);
            }
            tracker.advance();
        }

        for (const [path, move] of [...moves].sort(([a], [b]) => comparePaths(a, b))) {
            const data = working.get(path);
            if (data === undefined) continue;
            working.delete(path);
            working.set(move.path, data);
            changed.delete(path);
            changed.add(move.path);
        }
    }

    // Files pointing at a removed base model are checked too.
    const checked = new Set(changed);
    for (const identifier of removed) {
        for (const path of index.referencesTo(identifier, "model")) {
            const moved = moves.get(path);
            checked.add(moved ? moved.path : path);
        }
    }
    validateReferences(working, { externalNamespaces: config.externalNamespaces, paths: [...checked] });

    report.rewritten(changed.size);
    await working.flush(outputDir, previous, tracker);
    return report.freeze();
}

export { DEFINITION_LAYOUT, normalizeFolderStructure, planMove, splitDefinition };
export type { DefinitionLayout, ModelMove };
