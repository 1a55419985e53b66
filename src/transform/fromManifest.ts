import path from "path";
import { TransformEngine } from "./engine";
import { transformGzipPart } from "./gzipPart";
import { orderedParts, readManifest } from "../vault/manifest";
import { canonicalOutputPath, transformMetaPath } from "../io/paths";
import { validateJsonlFile } from "../io/jsonl";
import { ensureDir, pathExists, removeFile } from "../utils/fs";
import { StageLogger } from "../utils/logger";

export interface ManifestTransformParams {
  manifestPath: string;
  transformName: string;
  transformRegistry: string;
  outputDir: string;
  engine: TransformEngine;
  logger: StageLogger;
  stageName?: string;
}

export async function resolveTransformMeta(transformRegistry: string, transformName: string): Promise<string> {
  const metaPath = transformMetaPath(transformRegistry, transformName);
  if (!(await pathExists(metaPath))) {
    throw new Error(`Transform metadata not found: ${metaPath}`);
  }
  return metaPath;
}

/**
 * Rebuilds `<outputDir>/<source>/<account>.jsonl` from every part of one run.
 * The output file is deleted first, so reprocessing the same run always
 * produces the same file.
 */
export async function transformFromManifest(params: ManifestTransformParams): Promise<number> {
  const { logger, manifestPath } = params;
  const stage = params.stageName ?? "canonize";
  const manifest = await readManifest(manifestPath);
  const runDir = path.dirname(manifestPath);

  if (manifest.parts.length === 0) {
    logger.warn(`No parts found in manifest: ${manifestPath}`, { stage, manifest: manifestPath });
    return 0;
  }

  logger.info(`Processing ${manifest.parts.length} part(s) from manifest`, {
    stage,
    event: "manifest_parts_found",
    manifest: manifestPath,
    parts_count: manifest.parts.length,
    total_records: manifest.totals.records
  });

  const transformMeta = await resolveTransformMeta(params.transformRegistry, params.transformName);

  const outputFile = canonicalOutputPath(params.outputDir, manifest.source, manifest.account);
  await ensureDir(path.dirname(outputFile));

  if (await removeFile(outputFile)) {
    logger.debug(`Clearing existing canonical output: ${outputFile}`, { stage, output: outputFile });
  }

  let totalRecords = 0;

  for (const part of orderedParts(manifest)) {
    const partPath = path.join(runDir, part.path);

    if (!(await pathExists(partPath))) {
      logger.warn(`Part file not found: ${partPath}`, { stage, manifest: manifestPath, seq: part.seq });
      continue;
    }

    totalRecords += await transformGzipPart({
      partPath,
      transformMeta,
      outputFile,
      engine: params.engine,
      logger
    });
  }

  if ((await pathExists(outputFile)) && !(await validateJsonlFile(outputFile))) {
    logger.warn(`Output file ${outputFile} contains invalid JSONL`, {
      stage,
      event: "invalid_jsonl",
      file: outputFile
    });
  }

  return totalRecords;
}
