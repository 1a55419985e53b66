import { StageConfig } from "../config/stageConfig";
import { canonizerBinPath } from "../io/paths";
import { createCanonizerEngine, TransformEngine } from "../transform/engine";
import { transformFromManifest } from "../transform/fromManifest";
import { findManifests } from "../vault/findManifests";
import { ensureDir, isDirectory, isWritable, listFilesRecursive, pathExists } from "../utils/fs";
import { elapsedSeconds } from "../utils/time";
import { StageLogger } from "../utils/logger";
import { StageResult } from "../types/stageResult";
import { ManifestOutcome, manifestFailureMessage, summarizeOutcomes, toOutcomeError } from "./outcome";

export const STAGE_NAME = "canonize";

export interface StageDeps {
  logger: StageLogger;
  /** Defaults to the canonizer binary inside `venv_path`. */
  engine?: TransformEngine;
}

export function engineForConfig(config: StageConfig): TransformEngine {
  return createCanonizerEngine({
    binPath: canonizerBinPath(config.venv_path),
    timeoutMs: config.timeout_ms
  });
}

async function assertExists(filePath: string, label: string): Promise<void> {
  if (!(await pathExists(filePath))) {
    throw new Error(`${label} not found: ${filePath}`);
  }
}

export async function validateCanonizeStage(config: StageConfig): Promise<void> {
  await assertExists(config.repo_path, "Canonizer repo");
  await assertExists(config.venv_path, "Canonizer venv");
  await assertExists(canonizerBinPath(config.venv_path), "Canonizer executable");
  await assertExists(config.transform_registry, "Transform registry");

  if (!(await isDirectory(config.input_dir))) {
    throw new Error(`Vault directory does not exist: ${config.input_dir}`);
  }

  await ensureDir(config.output_dir);
  if (!(await isWritable(config.output_dir))) {
    throw new Error(`Output directory is not writable: ${config.output_dir}`);
  }

  if (config.mappings.length === 0) {
    throw new Error("No transform mappings configured");
  }
}

export async function collectOutputFiles(outputDir: string): Promise<string[]> {
  if (!(await isDirectory(outputDir))) return [];
  const files = await listFilesRecursive(outputDir, (filePath) => filePath.endsWith(".jsonl"));
  return files.sort();
}

export async function executeCanonizeStage(config: StageConfig, deps: StageDeps): Promise<StageResult> {
  const { logger } = deps;
  const engine = deps.engine ?? engineForConfig(config);
  const outcomes: ManifestOutcome[] = [];

  logger.info(`Starting canonization with ${config.mappings.length} mappings from vault`, {
    stage: STAGE_NAME,
    event: "canonize_started",
    mappings_count: config.mappings.length,
    vault_root: config.input_dir
  });

  for (const mapping of config.mappings) {
    const sourcePath = mapping.source_pattern;
    const manifests = await findManifests(config.input_dir, sourcePath, logger);

    if (manifests.length === 0) {
      logger.warn(`No manifests found for source: ${sourcePath}`, {
        stage: STAGE_NAME,
        event: "no_manifests_found",
        source_path: sourcePath
      });
      continue;
    }

    logger.info(`Found ${manifests.length} manifest(s) for ${sourcePath}`, {
      stage: STAGE_NAME,
      event: "manifests_discovered",
      source_path: sourcePath,
      manifest_count: manifests.length
    });

    for (const manifestPath of manifests) {
      try {
        const records = await transformFromManifest({
          manifestPath,
          transformName: mapping.transform,
          transformRegistry: config.transform_registry,
          outputDir: config.output_dir,
          engine,
          logger,
          stageName: STAGE_NAME
        });
        outcomes.push({ status: "ok", manifest: manifestPath, records });
        logger.info(`Transformed ${records} records from ${manifestPath}`, {
          stage: STAGE_NAME,
          event: "manifest_transformed",
          manifest: manifestPath,
          records
        });
      } catch (error) {
        const outcomeError = toOutcomeError(error);
        outcomes.push({ status: "error", manifest: manifestPath, error: outcomeError });
        logger.error(manifestFailureMessage(manifestPath, outcomeError), {
          stage: STAGE_NAME,
          event: "transform_error",
          manifest: manifestPath,
          error: outcomeError.message
        });
      }
    }
  }

  const outputFiles = await collectOutputFiles(config.output_dir);
  const summary = summarizeOutcomes(outcomes, outputFiles.length);

  return {
    stage_name: STAGE_NAME,
    success: summary.success,
    duration_seconds: 0,
    records_processed: summary.records,
    output_files: outputFiles,
    error_message: summary.errorMessage,
    metadata: {
      transform_registry: config.transform_registry,
      mappings_applied: config.mappings.length,
      manifests_processed: summary.manifestsProcessed,
      errors: summary.errors.length,
      error_details: summary.errors
    }
  };
}

/** Validates preconditions, then executes. Precondition failures throw. */
export async function runCanonizeStage(config: StageConfig, deps: StageDeps): Promise<StageResult> {
  const startedAt = Date.now();
  await validateCanonizeStage(config);
  const result = await executeCanonizeStage(config, deps);
  const durationSeconds = elapsedSeconds(startedAt);

  deps.logger.info(`Stage ${STAGE_NAME} ${result.success ? "completed" : "failed"}`, {
    stage: STAGE_NAME,
    event: result.success ? "stage_completed" : "stage_failed",
    records: result.records_processed,
    errors: result.metadata.errors,
    duration_seconds: durationSeconds
  });

  return { ...result, duration_seconds: durationSeconds };
}
