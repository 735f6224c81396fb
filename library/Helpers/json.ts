import type { JsonObject, JsonValue } from "../Types/ItemModel/Details/details.ts";

const decoder = new TextDecoder();
const encoder = new TextEncoder();

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON asset. The decoder drops the byte order mark many pack editors write.
 */
function parseJson(bytes: Uint8Array): JsonValue {
    return JSON.parse(decoder.decode(bytes));
}

/**
 * Serialize an asset the way it is written to a pack: item definitions indented by 4, models by 2.
 */
function encodeJson(path: string, value: JsonValue): Uint8Array {
    const indent = /^assets\/[^/]+\/items\//.test(path) ? 4 : 2;
    return encoder.encode(JSON.stringify(value, null, indent));
}

function omitKeys(value: JsonObject, keys: readonly string[]): JsonObject {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
        if (!keys.includes(key)) result[key] = entry;
    }
    return result;
}

export { encodeJson, isJsonObject, omitKeys, parseJson };
