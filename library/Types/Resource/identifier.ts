/**
 * Asset kinds addressable by a resource identifier.
 */
type AssetKind = "model" | "texture" | "itemDefinition";

interface ResourceIdentifier {
    namespace: string; // Defaults to "minecraft" when omitted in source JSON.
    path: string; // e.g. "item/stick"
}

interface AssetReference {
    kind: AssetKind;
    raw: string; // Identifier exactly as written in the file.
    identifier: ResourceIdentifier;
    pointer: string; // JSON pointer inside the file, e.g. "/textures/layer0".
}

export type { AssetKind, AssetReference, ResourceIdentifier };
