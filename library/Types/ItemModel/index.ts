import type { ResourceIdentifier } from "../Resource/identifier.ts";
import type { JsonObject } from "./Details/details.ts";

/**
 * One legacy `overrides` entry keyed on custom_model_data.
 */
interface PredicateOverride {
    customModelDataValue: number;
    modelReference: ResourceIdentifier;
    index: number; // Position in the source `overrides` array.
}

/**
 * A legacy item model carrying predicate overrides, e.g. assets/minecraft/models/item/stick.json.
 */
interface ItemDefinition {
    identifier: ResourceIdentifier; // Also the base model reference.
    path: string;
    name: string; // Item base name, e.g. "stick".
    base: JsonObject; // Model fields with `overrides` removed.
    overrides: PredicateOverride[];
}

export type { ItemDefinition, PredicateOverride };
