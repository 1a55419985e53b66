import path from "path";
import { loadStageConfig } from "../config/loadConfig";
import { DEFAULT_OUTPUT_NAME, MappingConfig, StageConfig } from "../config/stageConfig";
import { engineForConfig } from "../stage/canonize";
import { transformFile } from "../transform/transformFile";
import { StageLogger } from "../utils/logger";

export interface TransformFileOptions {
  configPath: string;
  inputFile: string;
  /** Source pattern of a configured mapping; supplies transform and output name. */
  mapping?: string;
  transform?: string;
  outputName?: string;
  logger: StageLogger;
}

export function findMapping(config: StageConfig, sourcePattern: string): MappingConfig {
  const mapping = config.mappings.find((entry) => entry.source_pattern === sourcePattern);
  if (!mapping) {
    throw new Error(`No mapping configured for source pattern ${sourcePattern}`);
  }
  return mapping;
}

export async function runTransformFile(options: TransformFileOptions): Promise<void> {
  const config = await loadStageConfig(options.configPath);
  const mapping = options.mapping ? findMapping(config, options.mapping) : undefined;
  const transformName = options.transform ?? mapping?.transform;
  if (!transformName) {
    throw new Error("Either --transform or --mapping is required");
  }

  const result = await transformFile({
    inputFile: path.resolve(options.inputFile),
    transformName,
    transformRegistry: config.transform_registry,
    outputDir: config.output_dir,
    outputName: options.outputName ?? mapping?.output_name ?? DEFAULT_OUTPUT_NAME,
    engine: engineForConfig(config),
    logger: options.logger
  });
  console.log(`Wrote ${result.records} records to ${result.outputFile}`);
}
