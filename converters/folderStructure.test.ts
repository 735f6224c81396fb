import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fse from "fs-extra";
import { DuplicateVariantError, ResourceReferenceError } from "../library/Errors/index.ts";
import { listPack, makeTempDir, PNG_BYTES, readPackJson, snapshotPack, writePack } from "../library/Helpers/testing.ts";
import { normalizeFolderStructure, planMove } from "./folderStructure.ts";

const appleDispatch = {
    type: "minecraft:range_dispatch",
    property: "minecraft:custom_model_data",
    index: 0,
    fallback: { type: "minecraft:model", model: "minecraft:item/apple" },
    entries: [{ threshold: 1, model: { type: "minecraft:model", model: "minecraft:item/golden_apple" } }],
};

describe("planMove", () => {
    const rules = [{ from: "custom", to: "item/custom" }];

    it("relocates models under a rule's folder", () => {
        expect(planMove("assets/mypack/models/custom/blade.json", rules)).toEqual({
            from: { namespace: "mypack", path: "custom/blade" },
            to: { namespace: "mypack", path: "item/custom/blade" },
            path: "assets/mypack/models/item/custom/blade.json",
        });
    });

    it("leaves other files alone", () => {
        expect(planMove("assets/mypack/models/customs/blade.json", rules)).toBeUndefined();
        expect(planMove("assets/mypack/textures/custom/blade.png", rules)).toBeUndefined();
    });
});

describe("normalizeFolderStructure", () => {
    let root = "";

    beforeEach(async () => {
        root = await makeTempDir();
    });

    afterEach(async () => {
        await fse.remove(root);
    });

    it("moves a converted definition to items and drops the empty base model", async () => {
        await writePack(root, { "assets/minecraft/models/item/apple.json": { model: appleDispatch } });

        const report = await normalizeFolderStructure(root);

        expect(await listPack(root)).toEqual(["assets/minecraft/items/apple.json"]);
        expect(await readPackJson(root, "assets/minecraft/items/apple.json")).toEqual({ model: appleDispatch });
        expect(report.filesRewritten).toBe(1);
    });

    it("is a no-op on a normalized tree", async () => {
        await writePack(root, {
            "assets/minecraft/models/item/apple.json": { parent: "item/generated", textures: { layer0: "item/apple" }, model: appleDispatch },
        });
        await normalizeFolderStructure(root);
        const first = await snapshotPack(root);

        const report = await normalizeFolderStructure(root);

        expect(await snapshotPack(root)).toEqual(first);
        expect(report.filesRewritten).toBe(0);
        expect([...first.keys()]).toEqual(["assets/minecraft/items/apple.json", "assets/minecraft/models/item/apple.json"]);
    });

    it("validates before touching the disk", async () => {
        const relic = {
            model: {
                type: "minecraft:range_dispatch",
                property: "minecraft:custom_model_data",
                index: 0,
                fallback: { type: "minecraft:model", model: "mypack:item/relic" },
                entries: [],
            },
        };
        await writePack(root, { "assets/mypack/models/item/relic.json": relic });

        const error = await normalizeFolderStructure(root).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(ResourceReferenceError);
        expect(error).toMatchObject({
            unresolved: [{ path: "assets/mypack/items/relic.json", identifier: "mypack:item/relic", pointer: "/model/fallback/model" }],
        });
        expect(await listPack(root)).toEqual(["assets/mypack/models/item/relic.json"]);
    });

    it("finishes a flush once it has started, even when cancelled", async () => {
        await writePack(root, {
            "assets/minecraft/models/item/apple.json": { parent: "item/generated", textures: { layer0: "item/apple" }, model: appleDispatch },
        });
        let moving = false;

        await normalizeFolderStructure(root, {
            progress: {
                message: text => {
                    if (text === "Moving files...") moving = true;
                },
                report: () => undefined,
            },
            isCancelled: () => moving,
        });

        expect(moving).toBe(true);
        expect(await listPack(root)).toEqual(["assets/minecraft/items/apple.json", "assets/minecraft/models/item/apple.json"]);
        expect(await readPackJson(root, "assets/minecraft/models/item/apple.json")).toEqual({
            parent: "item/generated",
            textures: { layer0: "item/apple" },
        });
        expect((await normalizeFolderStructure(root)).filesRewritten).toBe(0);
    });

    it("refuses to overwrite an existing item definition", async () => {
        await writePack(root, {
            "assets/minecraft/items/apple.json": { model: { type: "minecraft:model", model: "item/apple" } },
            "assets/minecraft/models/item/apple.json": { model: appleDispatch },
        });

        await expect(normalizeFolderStructure(root)).rejects.toBeInstanceOf(DuplicateVariantError);
    });

    it("relocates model folders and rewrites every reference to them", async () => {
        await writePack(root, {
            "assets/mypack/items/blade.json": { model: { type: "minecraft:model", model: "mypack:custom/blade" } },
            "assets/mypack/models/custom/blade.json": { parent: "item/handheld", textures: { layer0: "mypack:item/blade" } },
            "assets/mypack/models/custom/blade_glow.json": { parent: "mypack:custom/blade" },
            "assets/mypack/textures/item/blade.png": PNG_BYTES,
        });
        const options = { config: { layout: [{ from: "custom", to: "item/custom" }] } };

        const report = await normalizeFolderStructure(root, options);

        expect(await listPack(root)).toEqual([
            "assets/mypack/items/blade.json",
            "assets/mypack/models/item/custom/blade.json",
            "assets/mypack/models/item/custom/blade_glow.json",
            "assets/mypack/textures/item/blade.png",
        ]);
        expect(await readPackJson(root, "assets/mypack/items/blade.json")).toEqual({
            model: { type: "minecraft:model", model: "mypack:item/custom/blade" },
        });
        expect(await readPackJson(root, "assets/mypack/models/item/custom/blade_glow.json")).toEqual({ parent: "mypack:item/custom/blade" });
        expect(await readPackJson(root, "assets/mypack/models/item/custom/blade.json")).toEqual({
            parent: "item/handheld",
            textures: { layer0: "mypack:item/blade" },
        });
        expect(report.filesRewritten).toBe(3);

        const second = await normalizeFolderStructure(root, options);
        expect(second.filesRewritten).toBe(0);
    });
});
