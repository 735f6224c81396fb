export { buildArchive } from "./archive.ts";
export { classifyTree, walkPack } from "./classifier.ts";
export type { AssetCategory, ClassifiedAsset } from "./classifier.ts";
export { convertCustomModelData, TARGET_ENCODINGS } from "./customModelData.ts";
export { normalizeFolderStructure } from "./folderStructure.ts";
export { convertItemModel } from "./itemModel.ts";
export { findUnresolved, validateReferences } from "./references.ts";
export { stageInput } from "./staging.ts";
