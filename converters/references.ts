import { ResourceResolver } from "../library/Classes/resourceResolver.ts";
import type { ResourceTree } from "../library/Classes/resourceTree.ts";
import { ResourceReferenceError } from "../library/Errors/index.ts";
import type { UnresolvedReference } from "../library/Errors/index.ts";
import { formatIdentifier } from "../library/Helpers/identifier.ts";
import { extractReferences } from "../library/Helpers/references.ts";

interface ValidationOptions {
    externalNamespaces?: readonly string[];
    paths?: readonly string[]; // Documents to check. Every file in the tree when omitted.
}

/**
 * Every reference made by a checked document that neither the tree nor the game provides.
 */
function findUnresolved(tree: ResourceTree, options: ValidationOptions = {}): UnresolvedReference[] {
    const resolver = new ResourceResolver(tree, options.externalNamespaces);
    const paths = [...(options.paths ?? tree.paths())].sort();
    const unresolved: UnresolvedReference[] = [];

    for (const path of paths) {
        if (!path.endsWith(".json")) continue;
        const document = tree.readJson(path);
        if (document === undefined) continue;
        for (const ref of extractReferences(path, document)) {
            if (resolver.isResolvable(ref.identifier, ref.kind)) continue;
            unresolved.push({ path, identifier: formatIdentifier(ref.identifier), pointer: ref.pointer });
        }
    }
    return unresolved;
}

/**
 * Raise one ResourceReferenceError listing every unresolved reference.
 */
function validateReferences(tree: ResourceTree, options: ValidationOptions = {}): void {
    const unresolved = findUnresolved(tree, options);
    if (unresolved.length > 0) throw new ResourceReferenceError(unresolved);
}

export { findUnresolved, validateReferences };
export type { ValidationOptions };
