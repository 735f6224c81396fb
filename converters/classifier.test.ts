import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fse from "fs-extra";
import { ConversionReport } from "../library/Classes/conversionReport.ts";
import { ResourceTree } from "../library/Classes/resourceTree.ts";
import { makeTempDir, PNG_BYTES, writePack } from "../library/Helpers/testing.ts";
import { classifyTree, walkPack } from "./classifier.ts";

const encoder = new TextEncoder();

function treeOf(files: Record<string, unknown>): ResourceTree {
    const tree = new ResourceTree();
    for (const [path, content] of Object.entries(files)) {
        tree.set(path, typeof content === "string" ? encoder.encode(content) : encoder.encode(JSON.stringify(content)));
    }
    return tree;
}

describe("classifyTree", () => {
    it("sorts files into asset categories in walk order", () => {
        const tree = treeOf({
            "pack.mcmeta": { pack: { pack_format: 34, description: "test" } },
            "assets/minecraft/models/item/stick.json": {
                parent: "item/handheld",
                overrides: [{ predicate: { custom_model_data: 1 }, model: "item/wand" }],
            },
            "assets/minecraft/models/item/custom/wand.json": { parent: "item/handheld", overrides: [] },
            "assets/minecraft/items/apple.json": { model: { type: "minecraft:model", model: "item/apple" } },
            "assets/minecraft/models/block/stone.json": { parent: "block/cube_all" },
            "assets/minecraft/lang/en_us.json": { "item.test": "Test" },
        });
        tree.set("assets/minecraft/textures/item/stick.png", PNG_BYTES);

        expect(classifyTree(tree).map(asset => [asset.path, asset.category])).toEqual([
            ["pack.mcmeta", "other"],
            ["assets/minecraft/models/item/stick.json", "legacyItemDefinition"],
            ["assets/minecraft/models/item/custom/wand.json", "model"],
            ["assets/minecraft/items/apple.json", "itemDefinition"],
            ["assets/minecraft/models/block/stone.json", "model"],
            ["assets/minecraft/lang/en_us.json", "other"],
            ["assets/minecraft/textures/item/stick.png", "other"],
        ]);
    });

    it("records malformed JSON and passes the file through", () => {
        const tree = treeOf({ "assets/minecraft/models/item/broken.json": "{ not json" });
        const report = new ConversionReport();

        const [asset] = classifyTree(tree, report);

        expect(asset).toEqual({ path: "assets/minecraft/models/item/broken.json", category: "other" });
        expect(report.problems).toHaveLength(1);
        expect(report.problems[0]?.path).toBe("assets/minecraft/models/item/broken.json");
        expect(report.problems[0]?.message.startsWith("Failed to parse \"assets/minecraft/models/item/broken.json\":")).toBe(true);
    });

    it("keeps item models without custom model data overrides as models", () => {
        const tree = treeOf({
            "assets/minecraft/models/item/bow.json": {
                parent: "item/generated",
                overrides: [{ predicate: { pulling: 1 }, model: "item/bow_pulling_0" }],
            },
            "assets/minecraft/models/item/wand.json": {
                parent: "item/handheld",
                overrides: [{ predicate: { custom_model_data: 2.5 }, model: "item/wand_glowing" }],
            },
        });

        expect(classifyTree(tree).map(asset => asset.category)).toEqual(["model", "model"]);
    });

    it("passes through overrides it cannot read", () => {
        const tree = treeOf({
            "assets/minecraft/models/item/stick.json": { overrides: [{ predicate: { custom_model_data: 1 } }] },
        });
        const report = new ConversionReport();

        expect(classifyTree(tree, report)[0]?.category).toBe("other");
        expect(report.problems[0]?.message.startsWith("Unreadable overrides:")).toBe(true);
    });
});

describe("walkPack", () => {
    let root = "";

    beforeEach(async () => {
        root = await makeTempDir();
    });

    afterEach(async () => {
        await fse.remove(root);
    });

    it("skips version control folders, hidden and ignored files", async () => {
        await writePack(root, {
            "pack.mcmeta": { pack: { pack_format: 34, description: "test" } },
            ".git/config": { core: true },
            ".hidden.json": {},
            "notes/todo.json": {},
            "assets/minecraft/models/item/stick.json": { parent: "item/generated" },
        });

        const { assets, report } = await walkPack(root, ["notes"]);

        expect(assets.map(asset => asset.path).sort()).toEqual(["assets/minecraft/models/item/stick.json", "pack.mcmeta"]);
        expect(report.problems).toEqual([]);
    });
});
