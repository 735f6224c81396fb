import type { JsonObject, JsonValue } from "../Types/ItemModel/Details/details.ts";
import type { AssetKind, AssetReference, ResourceIdentifier } from "../Types/Resource/identifier.ts";
import { DEFAULT_NAMESPACE, identifyPath, parseIdentifier } from "./identifier.ts";
import { isJsonObject } from "./json.ts";

/**
 * Called for every reference found in a document. Return a new identifier to rewrite it.
 */
type ReferenceVisitor = (reference: AssetReference) => ResourceIdentifier | undefined;

const MODEL_NODE_TYPES = new Set(["model", "minecraft:model"]);
const SPECIAL_NODE_TYPES = new Set(["special", "minecraft:special"]);

function reference(kind: AssetKind, raw: string, pointer: string): AssetReference {
    return { kind, raw, identifier: parseIdentifier(raw, DEFAULT_NAMESPACE), pointer };
}

// Keep the author's style: bare paths stay bare while they remain in the default namespace.
function formatLike(raw: string, identifier: ResourceIdentifier): string {
    if (!raw.includes(":") && identifier.namespace === DEFAULT_NAMESPACE) return identifier.path;
    return `${identifier.namespace}:${identifier.path}`;
}

function visitString(value: JsonValue, kind: AssetKind, pointer: string, visitor: ReferenceVisitor): JsonValue {
    if (typeof value !== "string") return value;
    const replacement = visitor(reference(kind, value, pointer));
    return replacement ? formatLike(value, replacement) : value;
}

/**
 * Walk an item model descriptor tree (`minecraft:model`, `minecraft:special`, dispatch nodes).
 */
function visitDescriptor(value: JsonValue, pointer: string, visitor: ReferenceVisitor): JsonValue {
    if (Array.isArray(value)) return value.map((entry, i) => visitDescriptor(entry, `${pointer}/${i}`, visitor));
    if (!isJsonObject(value)) return value;

    const type = value.type;
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
        const childPointer = `${pointer}/${key}`;
        if (key === "model" && typeof type === "string" && MODEL_NODE_TYPES.has(type)) {
            result[key] = visitString(entry, "model", childPointer, visitor);
        } else if (key === "base" && typeof type === "string" && SPECIAL_NODE_TYPES.has(type)) {
            result[key] = visitString(entry, "model", childPointer, visitor);
        } else {
            result[key] = visitDescriptor(entry, childPointer, visitor);
        }
    }
    return result;
}

function visitModel(value: JsonObject, visitor: ReferenceVisitor): JsonObject {
    const result: JsonObject = { ...value };

    if (typeof value.parent === "string") result.parent = visitString(value.parent, "model", "/parent", visitor);

    const textures = value.textures;
    if (isJsonObject(textures)) {
        const rewritten: JsonObject = {};
        for (const [slot, texture] of Object.entries(textures)) {
            // "#layer0" style values point at another slot, not at a file.
            rewritten[slot] = typeof texture === "string" && texture.startsWith("#")
                ? texture
                : visitString(texture, "texture", `/textures/${slot}`, visitor);
        }
        result.textures = rewritten;
    }

    const overrides = value.overrides;
    if (Array.isArray(overrides)) {
        result.overrides = overrides.map((override, i) => {
            if (!isJsonObject(override) || typeof override.model !== "string") return override;
            return { ...override, model: visitString(override.model, "model", `/overrides/${i}/model`, visitor) };
        });
    }

    // Converted definitions still sitting in the model folder.
    if (isJsonObject(value.model)) result.model = visitDescriptor(value.model, "/model", visitor);

    return result;
}

/**
 * Visit every asset reference in the document stored at path. Returns the document with
 * replacements applied; non-asset paths are returned untouched.
 */
function visitReferences(path: string, document: JsonValue, visitor: ReferenceVisitor): JsonValue {
    const asset = identifyPath(path);
    if (!asset || !isJsonObject(document)) return document;
    if (asset.kind === "model") return visitModel(document, visitor);
    if (asset.kind === "itemDefinition") return visitDescriptor(document, "", visitor);
    return document;
}

function extractReferences(path: string, document: JsonValue): AssetReference[] {
    const found: AssetReference[] = [];
    visitReferences(path, document, ref => {
        found.push(ref);
        return undefined;
    });
    return found;
}

export { extractReferences, visitReferences };
export type { ReferenceVisitor };
