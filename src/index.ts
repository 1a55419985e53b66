export { StageConfigSchema, DEFAULT_OUTPUT_NAME } from "./config/stageConfig";
export type { StageConfig, MappingConfig } from "./config/stageConfig";
export { loadStageConfig } from "./config/loadConfig";
export { findManifests, readLatestMarker } from "./vault/findManifests";
export { readManifest, orderedParts } from "./vault/manifest";
export type { VaultManifest, ManifestPart } from "./vault/manifest";
export { createCanonizerEngine } from "./transform/engine";
export type { TransformEngine, TransformRequest, TransformResponse } from "./transform/engine";
export { transformGzipPart } from "./transform/gzipPart";
export { transformFromManifest } from "./transform/fromManifest";
export { transformFile } from "./transform/transformFile";
export {
  STAGE_NAME,
  validateCanonizeStage,
  executeCanonizeStage,
  runCanonizeStage
} from "./stage/canonize";
export { summarizeOutcomes } from "./stage/outcome";
export type { ManifestOutcome } from "./stage/outcome";
export type { StageResult } from "./types/stageResult";
export { createLogger } from "./utils/logger";
export type { StageLogger } from "./utils/logger";
