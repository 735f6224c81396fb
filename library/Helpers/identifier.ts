import type { AssetKind, ResourceIdentifier } from "../Types/Resource/identifier.ts";

const DEFAULT_NAMESPACE = "minecraft";

// Asset kind -> folder under assets/<namespace>/ and file extension.
const KIND_LAYOUT: Record<AssetKind, { folder: string; extension: string }> = {
    model: { folder: "models", extension: ".json" },
    texture: { folder: "textures", extension: ".png" },
    itemDefinition: { folder: "items", extension: ".json" },
};

const ASSET_KINDS: readonly AssetKind[] = ["model", "texture", "itemDefinition"];

const ASSET_PATH = /^assets\/([^/]+)\/(models|textures|items)\/(.+)\.(json|png)$/;

/**
 * Parse `namespace:path`. A bare path belongs to the default namespace, as in game.
 */
function parseIdentifier(raw: string, defaultNamespace: string = DEFAULT_NAMESPACE): ResourceIdentifier {
    const separator = raw.indexOf(":");
    if (separator < 0) return { namespace: defaultNamespace, path: raw };
    return {
        namespace: raw.slice(0, separator) || defaultNamespace,
        path: raw.slice(separator + 1),
    };
}

function formatIdentifier(identifier: ResourceIdentifier): string {
    return `${identifier.namespace}:${identifier.path}`;
}

/**
 * Concrete tree path an identifier of the given kind lives at.
 */
function assetPath(identifier: ResourceIdentifier, kind: AssetKind): string {
    const { folder, extension } = KIND_LAYOUT[kind];
    return `assets/${identifier.namespace}/${folder}/${identifier.path}${extension}`;
}

/**
 * Inverse of assetPath.
 */
function identifyPath(path: string): { kind: AssetKind; identifier: ResourceIdentifier } | undefined {
    const match = ASSET_PATH.exec(path);
    if (!match) return undefined;
    const [, namespace, folder, assetName, extension] = match;

    const kind = ASSET_KINDS.find(k => KIND_LAYOUT[k].folder === folder);
    if (!kind || KIND_LAYOUT[kind].extension !== `.${extension}`) return undefined;
    return { kind, identifier: { namespace, path: assetName } };
}

// Hardcoded parents such as builtin/generated never exist as files.
function isBuiltinModel(identifier: ResourceIdentifier): boolean {
    return identifier.namespace === DEFAULT_NAMESPACE && identifier.path.startsWith("builtin/");
}

export { assetPath, DEFAULT_NAMESPACE, formatIdentifier, identifyPath, isBuiltinModel, parseIdentifier };
