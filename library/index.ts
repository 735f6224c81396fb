export { ConversionReport } from "./Classes/conversionReport.ts";
export type { AssetProblem } from "./Classes/conversionReport.ts";
export { ProgressTracker } from "./Classes/progressTracker.ts";
export { ReferenceIndex } from "./Classes/referenceIndex.ts";
export { ResourceResolver } from "./Classes/resourceResolver.ts";
export { ResourceTree } from "./Classes/resourceTree.ts";
export { configSchema, DEFAULT_CONFIG, formatIssues, resolveConfig } from "./Config/config.ts";
export * from "./Errors/index.ts";
export { assetPath, formatIdentifier, identifyPath, parseIdentifier } from "./Helpers/identifier.ts";
export { logProcess } from "./Helpers/log.ts";
export type { LogColor } from "./Helpers/log.ts";
export { extractReferences, visitReferences } from "./Helpers/references.ts";

export type { Config } from "./Types/Config/config.ts";
export type { ConversionOptions, LayoutRule, ProgressSink, TargetFormat } from "./Types/Converter/index.ts";
export type * from "./Types/ItemModel/Details/details.ts";
export type { ItemDefinition, PredicateOverride } from "./Types/ItemModel/index.ts";
export type { AssetKind, AssetReference, ResourceIdentifier } from "./Types/Resource/identifier.ts";
