import { TransformEngine } from "./engine";
import { engineFailureMessage } from "./gzipPart";
import { resolveTransformMeta } from "./fromManifest";
import { datedOutputPath } from "../io/paths";
import { validateJsonlFile } from "../io/jsonl";
import { appendText, ensureDir } from "../utils/fs";
import { countNewlines } from "../utils/text";
import { utcDateStamp } from "../utils/time";
import { StageLogger } from "../utils/logger";

export interface FileTransformParams {
  inputFile: string;
  transformName: string;
  transformRegistry: string;
  outputDir: string;
  outputName: string;
  engine: TransformEngine;
  logger: StageLogger;
  date?: Date;
}

export interface FileTransformResult {
  outputFile: string;
  records: number;
}

/**
 * Transforms a plain JSONL file that lives outside the vault. The engine reads
 * the file itself via `--input`; output is appended to
 * `<outputDir>/<outputName>-<YYYYMMDD>.jsonl`.
 */
export async function transformFile(params: FileTransformParams): Promise<FileTransformResult> {
  const transformMeta = await resolveTransformMeta(params.transformRegistry, params.transformName);
  const outputFile = datedOutputPath(params.outputDir, params.outputName, utcDateStamp(params.date));

  params.logger.debug(`Transforming file: ${params.inputFile}`, { input: params.inputFile, meta: transformMeta });

  const response = await params.engine({
    metaPath: transformMeta,
    input: "",
    extraArgs: ["--input", params.inputFile]
  });

  if (response.exitCode !== 0) {
    throw new Error(engineFailureMessage(response));
  }

  await ensureDir(params.outputDir);
  await appendText(outputFile, response.stdout);

  if (!(await validateJsonlFile(outputFile))) {
    params.logger.warn(`Output file ${outputFile} contains invalid JSONL`, {
      event: "invalid_jsonl",
      file: outputFile
    });
  }

  return { outputFile, records: countNewlines(response.stdout) };
}
