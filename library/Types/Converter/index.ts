import type { Config } from "../Config/config.ts";

/**
 * Item definition encodings the custom model data converter can target.
 * Both read the first entry of the custom_model_data component (1.21.4+).
 */
type TargetFormat = "range_dispatch" | "select";

/**
 * Model folder relocation, relative to `assets/<namespace>/models/`.
 */
interface LayoutRule {
    from: string; // e.g. "custom"
    to: string; // e.g. "item/custom"
}

/**
 * Progress capability handed to the converters by the caller.
 * Called synchronously, once per processed file.
 */
interface ProgressSink {
    report(completed: number, total: number): void;
    message(text: string): void;
}

interface ConversionOptions {
    progress?: ProgressSink; // Receives per-file progress and phase messages.
    isCancelled?: () => boolean; // Polled at every checkpoint; a true result aborts the run.
    config?: Partial<Config>; // Overrides merged over the default config.
}

export type { ConversionOptions, LayoutRule, ProgressSink, TargetFormat };
