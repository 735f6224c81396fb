import { describe, expect, it } from "vitest";
import { extractReferences, visitReferences } from "./references.ts";

describe("extractReferences", () => {
    it("finds parent, texture and override references in a model", () => {
        const model = {
            parent: "item/handheld",
            textures: { layer0: "item/stick", particle: "#layer0" },
            overrides: [{ predicate: { custom_model_data: 1 }, model: "mypack:item/wand" }],
        };

        expect(extractReferences("assets/minecraft/models/item/stick.json", model)).toEqual([
            { kind: "model", raw: "item/handheld", identifier: { namespace: "minecraft", path: "item/handheld" }, pointer: "/parent" },
            { kind: "texture", raw: "item/stick", identifier: { namespace: "minecraft", path: "item/stick" }, pointer: "/textures/layer0" },
            { kind: "model", raw: "mypack:item/wand", identifier: { namespace: "mypack", path: "item/wand" }, pointer: "/overrides/0/model" },
        ]);
    });

    it("finds model and special base references in an item definition", () => {
        const definition = {
            model: {
                type: "minecraft:select",
                property: "minecraft:custom_model_data",
                cases: [{ when: "1", model: { type: "minecraft:model", model: "item/ruby" } }],
                fallback: { type: "minecraft:special", base: "mypack:item/chest", model: { type: "minecraft:chest" } },
            },
        };

        const refs = extractReferences("assets/minecraft/items/stick.json", definition);
        expect(refs.map(ref => [ref.raw, ref.pointer])).toEqual([
            ["item/ruby", "/model/cases/0/model/model"],
            ["mypack:item/chest", "/model/fallback/base"],
        ]);
    });

    it("ignores files outside the asset folders", () => {
        expect(extractReferences("pack.mcmeta", { parent: "item/stick" })).toEqual([]);
    });
});

describe("visitReferences", () => {
    it("rewrites matching references and keeps the author's notation", () => {
        const model = { parent: "custom/blade", textures: { layer0: "mypack:custom/blade" } };
        const rewritten = visitReferences("assets/minecraft/models/item/blade.json", model, ref =>
            ref.identifier.path === "custom/blade" ? { namespace: ref.identifier.namespace, path: "item/custom/blade" } : undefined);

        expect(rewritten).toEqual({ parent: "item/custom/blade", textures: { layer0: "mypack:item/custom/blade" } });
    });
});
