import { ConversionReport } from "../library/Classes/conversionReport.ts";
import { ProgressTracker } from "../library/Classes/progressTracker.ts";
import type { ResourceResolver } from "../library/Classes/resourceResolver.ts";
import { resolveConfig } from "../library/Config/config.ts";
import { AmbiguousPredicateError } from "../library/Errors/index.ts";
import { formatIdentifier, parseIdentifier } from "../library/Helpers/identifier.ts";
import { isJsonObject, omitKeys } from "../library/Helpers/json.ts";
import { logProcess } from "../library/Helpers/log.ts";
import type { Config } from "../library/Types/Config/config.ts";
import type { ConversionOptions } from "../library/Types/Converter/index.ts";
import type { ItemDefinition, PredicateOverride } from "../library/Types/ItemModel/index.ts";
import type { ClassifiedAsset } from "./classifier.ts";
import { customModelDataSchema, overridesSchema } from "./classifier.ts";

interface ConversionRun {
    config: Config;
    tracker: ProgressTracker;
    report: ConversionReport;
}

/**
 * Creates the error raised when two overrides share a custom model data value.
 */
type DuplicateFactory = (value: number, first: string, second: string) => Error;

const LEGACY_DEFINITION_PATH = /^assets\/([^/]+)\/models\/item\/([^/]+)\.json$/;

function startRun(options: ConversionOptions): ConversionRun {
    return {
        config: resolveConfig(options.config),
        tracker: ProgressTracker.from(options),
        report: new ConversionReport(),
    };
}

function warnSkipped(report: ConversionReport, message: string): void {
    report.warn(message);
    logProcess("Convert", "orange", message, console.warn);
}

/**
 * Namespace and item name of a legacy item model path.
 */
function legacyIdentity(path: string): { namespace: string; name: string } | undefined {
    const match = LEGACY_DEFINITION_PATH.exec(path);
    if (!match) return undefined;
    const [, namespace, name] = match;
    return { namespace, name };
}

function overrideLocation(path: string, index: number): string {
    return `${path}#overrides[${index}]`;
}

/**
 * Read the overrides of a legacy item model.
 * Predicates on anything but custom_model_data are dropped with a warning, and so are
 * overrides whose model is neither in the pack nor provided by the game.
 */
function parseItemDefinition(
    asset: ClassifiedAsset,
    resolver: ResourceResolver,
    report: ConversionReport,
    duplicate: DuplicateFactory = (value, first, second) => new AmbiguousPredicateError(value, first, second),
): ItemDefinition {
    const identity = legacyIdentity(asset.path);
    const data = asset.data;
    if (!identity || !isJsonObject(data)) throw new Error(`"${asset.path}" is not a legacy item definition.`);
    const { namespace, name } = identity;

    const overrides = overridesSchema.parse(data.overrides);
    const seen = new Map<number, number>();
    const parsed: PredicateOverride[] = [];

    overrides.forEach((override, index) => {
        const location = overrideLocation(asset.path, index);
        const keys = Object.keys(override.predicate);
        const value = customModelDataSchema.safeParse(override.predicate.custom_model_data);

        if (!value.success) {
            warnSkipped(report, `Dropped ${location}: predicate has no integer custom_model_data.`);
            return;
        }
        if (keys.length > 1) {
            warnSkipped(report, `Dropped ${location}: predicate combines custom_model_data with ${keys.filter(k => k !== "custom_model_data").join(", ")}.`);
            return;
        }

        const previous = seen.get(value.data);
        if (previous !== undefined) throw duplicate(value.data, overrideLocation(asset.path, previous), location);
        seen.set(value.data, index);

        parsed.push({ customModelDataValue: value.data, modelReference: parseIdentifier(override.model), index });
    });

    const resolved = parsed.filter(override => {
        if (resolver.isResolvable(override.modelReference, "model")) return true;
        warnSkipped(report, `Skipped ${overrideLocation(asset.path, override.index)}: model "${formatIdentifier(override.modelReference)}" does not exist.`);
        return false;
    });

    return {
        identifier: { namespace, path: `item/${name}` },
        path: asset.path,
        name,
        base: omitKeys(data, ["overrides"]),
        overrides: resolved,
    };
}

export { legacyIdentity, overrideLocation, parseItemDefinition, startRun, warnSkipped };
export type { ConversionRun, DuplicateFactory };
