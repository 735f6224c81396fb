/**
 * Conversion error taxonomy.
 * ParseError is recoverable and only ever recorded in a ConversionReport; every other
 * error terminates the run it was raised in.
 */

type ErrorCode =
    | "PARSE_ERROR"
    | "REFERENCE_ERROR"
    | "AMBIGUOUS_PREDICATE"
    | "DUPLICATE_VARIANT"
    | "PATH_SECURITY"
    | "IO_FAILURE"
    | "CANCELLED"
    | "CONFIG_ERROR";

interface UnresolvedReference {
    path: string; // File holding the reference.
    identifier: string; // namespace:path
    pointer: string;
}

class ConversionError extends Error {
    readonly code: ErrorCode;
    readonly paths: string[];

    constructor(code: ErrorCode, message: string, paths: string[] = [], options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
        this.paths = paths;
    }
}

class ParseError extends ConversionError {
    constructor(path: string, detail: string) {
        super("PARSE_ERROR", `Failed to parse "${path}": ${detail}`, [path]);
    }
}

// Named to avoid shadowing the global ReferenceError.
class ResourceReferenceError extends ConversionError {
    readonly unresolved: UnresolvedReference[];

    constructor(unresolved: UnresolvedReference[]) {
        const shown = unresolved.slice(0, 10).map(ref => `"${ref.identifier}" (${ref.path} at ${ref.pointer})`);
        const more = unresolved.length > shown.length ? ` and ${unresolved.length - shown.length} more` : "";
        super(
            "REFERENCE_ERROR",
            `Unresolved reference${unresolved.length === 1 ? "" : "s"}: ${shown.join(", ")}${more}.`,
            [...new Set(unresolved.map(ref => ref.path))],
        );
        this.unresolved = unresolved;
    }
}

class AmbiguousPredicateError extends ConversionError {
    readonly value: number | string;
    readonly locations: [string, string];

    constructor(value: number | string, first: string, second: string, code: ErrorCode = "AMBIGUOUS_PREDICATE", message?: string) {
        super(code, message ?? `Custom model data ${value} is declared twice: ${first} and ${second}.`, [first, second]);
        this.value = value;
        this.locations = [first, second];
    }
}

// A generated identifier would be written twice. Duplicate discriminators are the usual cause.
class DuplicateVariantError extends AmbiguousPredicateError {
    readonly identifier: string;

    constructor(identifier: string, first: string, second: string) {
        super(identifier, first, second, "DUPLICATE_VARIANT", `Variant "${identifier}" would be generated by both ${first} and ${second}.`);
        this.identifier = identifier;
    }
}

class PathSecurityError extends ConversionError {
    readonly entry: string;

    constructor(entry: string) {
        super("PATH_SECURITY", `Rejected unsafe archive entry "${entry}".`, [entry]);
        this.entry = entry;
    }
}

class IOFailure extends ConversionError {
    constructor(path: string, action: string, cause: unknown) {
        super("IO_FAILURE", `Failed to ${action} "${path}": ${describeError(cause)}`, [path], { cause });
    }
}

class CancellationError extends ConversionError {
    constructor() {
        super("CANCELLED", "Conversion was cancelled.");
    }
}

class ConfigError extends ConversionError {
    constructor(path: string, detail: string) {
        super("CONFIG_ERROR", `Invalid config at "${path}": ${detail}`, [path]);
    }
}

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export {
    AmbiguousPredicateError,
    CancellationError,
    ConfigError,
    ConversionError,
    describeError,
    DuplicateVariantError,
    IOFailure,
    ParseError,
    PathSecurityError,
    ResourceReferenceError,
};

export type { ErrorCode, UnresolvedReference };
