import { formatIdentifier } from "../Helpers/identifier.ts";
import { extractReferences } from "../Helpers/references.ts";
import type { JsonValue } from "../Types/ItemModel/Details/details.ts";
import type { AssetKind, AssetReference, ResourceIdentifier } from "../Types/Resource/identifier.ts";

interface IndexedDocument {
    path: string;
    data: JsonValue;
}

/**
 * Reverse lookup of asset references: which documents point at a given identifier.
 */
class ReferenceIndex {
    private readonly byTarget = new Map<string, Set<string>>();
    private readonly bySource = new Map<string, AssetReference[]>();

    public static build(documents: Iterable<IndexedDocument>): ReferenceIndex {
        const index = new ReferenceIndex();
        for (const { path, data } of documents) index.add(path, data);
        return index;
    }

    public add(path: string, data: JsonValue): void {
        const references = extractReferences(path, data);
        this.bySource.set(path, references);
        for (const ref of references) {
            const key = targetKey(ref.identifier, ref.kind);
            const sources = this.byTarget.get(key) ?? new Set<string>();
            sources.add(path);
            this.byTarget.set(key, sources);
        }
    }

    /**
     * Sorted paths of every document referencing the identifier as the given kind.
     */
    public referencesTo(identifier: ResourceIdentifier, kind: AssetKind): string[] {
        return [...(this.byTarget.get(targetKey(identifier, kind)) ?? [])].sort();
    }

    public referencesFrom(path: string): readonly AssetReference[] {
        return this.bySource.get(path) ?? [];
    }
}

function targetKey(identifier: ResourceIdentifier, kind: AssetKind): string {
    return `${kind}|${formatIdentifier(identifier)}`;
}

export { ReferenceIndex };
export type { IndexedDocument };
