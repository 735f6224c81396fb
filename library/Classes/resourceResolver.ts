import { ResourceReferenceError } from "../Errors/index.ts";
import { assetPath, formatIdentifier, identifyPath, isBuiltinModel } from "../Helpers/identifier.ts";
import type { AssetKind, ResourceIdentifier } from "../Types/Resource/identifier.ts";
import type { ResourceTree } from "./resourceTree.ts";

/**
 * Maps identifiers to tree paths. Identifiers in an external namespace that the pack
 * does not ship are provided by the game and count as resolved.
 */
class ResourceResolver {
    private readonly external: Set<string>;

    constructor(
        private readonly tree: ResourceTree,
        externalNamespaces: readonly string[] = ["minecraft"],
    ) {
        this.external = new Set(externalNamespaces);
    }

    /**
     * Path of the asset. Raises ResourceReferenceError when neither the pack nor the game provides it.
     */
    public resolve(identifier: ResourceIdentifier, kind: AssetKind, source = "(unknown)"): string {
        const path = assetPath(identifier, kind);
        if (!this.isResolvable(identifier, kind)) {
            throw new ResourceReferenceError([{ path: source, identifier: formatIdentifier(identifier), pointer: kind }]);
        }
        return path;
    }

    public isResolvable(identifier: ResourceIdentifier, kind: AssetKind): boolean {
        return this.isInTree(identifier, kind) || this.isGameProvided(identifier, kind);
    }

    public isInTree(identifier: ResourceIdentifier, kind: AssetKind): boolean {
        return this.tree.has(assetPath(identifier, kind));
    }

    public isGameProvided(identifier: ResourceIdentifier, kind: AssetKind): boolean {
        if (kind === "model" && isBuiltinModel(identifier)) return true;
        return this.external.has(identifier.namespace) && !this.isInTree(identifier, kind);
    }

    public identify(path: string) {
        return identifyPath(path);
    }
}

export { ResourceResolver };
