import { describe, expect, it } from "vitest";
import { ResourceReferenceError } from "../Errors/index.ts";
import { parseIdentifier } from "../Helpers/identifier.ts";
import { ReferenceIndex } from "./referenceIndex.ts";
import { ResourceResolver } from "./resourceResolver.ts";
import { ResourceTree } from "./resourceTree.ts";

function treeWith(...paths: string[]): ResourceTree {
    const tree = new ResourceTree();
    for (const path of paths) tree.setJson(path, {});
    return tree;
}

describe("ResourceResolver", () => {
    const tree = treeWith("assets/mypack/models/item/wand.json");
    const resolver = new ResourceResolver(tree, ["minecraft"]);

    it("resolves assets shipped in the pack", () => {
        expect(resolver.resolve(parseIdentifier("mypack:item/wand"), "model")).toBe("assets/mypack/models/item/wand.json");
    });

    it("treats missing assets of external namespaces as provided by the game", () => {
        expect(resolver.resolve(parseIdentifier("item/stick"), "texture")).toBe("assets/minecraft/textures/item/stick.png");
        expect(resolver.isGameProvided(parseIdentifier("builtin/entity"), "model")).toBe(true);
    });

    it("fails for anything else", () => {
        expect(() => resolver.resolve(parseIdentifier("mypack:item/staff"), "model", "assets/mypack/items/staff.json")).toThrow(ResourceReferenceError);
        expect(new ResourceResolver(tree, []).isResolvable(parseIdentifier("item/stick"), "model")).toBe(false);
    });

    it("identifies tree paths", () => {
        expect(resolver.identify("assets/mypack/models/item/wand.json")).toEqual({
            kind: "model",
            identifier: { namespace: "mypack", path: "item/wand" },
        });
    });
});

describe("ReferenceIndex", () => {
    it("maps identifiers to the documents referencing them", () => {
        const index = ReferenceIndex.build([
            { path: "assets/mypack/models/item/b.json", data: { parent: "mypack:item/base" } },
            { path: "assets/mypack/models/item/a.json", data: { parent: "mypack:item/base", textures: { layer0: "mypack:item/a" } } },
            { path: "assets/mypack/items/a.json", data: { model: { type: "minecraft:model", model: "mypack:item/a" } } },
        ]);

        expect(index.referencesTo(parseIdentifier("mypack:item/base"), "model")).toEqual([
            "assets/mypack/models/item/a.json",
            "assets/mypack/models/item/b.json",
        ]);
        expect(index.referencesTo(parseIdentifier("mypack:item/a"), "model")).toEqual(["assets/mypack/items/a.json"]);
        expect(index.referencesTo(parseIdentifier("mypack:item/a"), "texture")).toEqual(["assets/mypack/models/item/a.json"]);
        expect(index.referencesFrom("assets/mypack/models/item/a.json")).toHaveLength(2);
    });
});
