type JsonPrimitive = string | number | boolean | null;
type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
type JsonObject = { [key: string]: JsonValue };

// Component-based item model descriptors written to assets/<namespace>/items/.
type ModelDescriptor = { type: "minecraft:model"; model: string };

type RangeDispatchDescriptor = {
    type: "minecraft:range_dispatch";
    property: "minecraft:custom_model_data";
    index: number;
    fallback: ModelDescriptor;
    entries: { threshold: number; model: ModelDescriptor }[];
};

type SelectDescriptor = {
    type: "minecraft:select";
    property: "minecraft:custom_model_data";
    index: number;
    fallback: ModelDescriptor;
    cases: { when: string; model: ModelDescriptor }[];
};

type ItemModelDescriptor = ModelDescriptor | RangeDispatchDescriptor | SelectDescriptor;

type ItemDefinitionFile = { model: ItemModelDescriptor };

export type {
    ItemDefinitionFile,
    ItemModelDescriptor,
    JsonObject,
    JsonPrimitive,
    JsonValue,
    ModelDescriptor,
    RangeDispatchDescriptor,
    SelectDescriptor,
};
