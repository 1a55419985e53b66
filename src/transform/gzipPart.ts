import path from "path";
import { promises as fs } from "fs";
import { promisify } from "util";
import { gunzip } from "zlib";
import { TransformEngine, TransformResponse } from "./engine";
import { appendText } from "../utils/fs";
import { countNewlines, errorMessage, truncate } from "../utils/text";
import { StageLogger } from "../utils/logger";

const gunzipAsync = promisify(gunzip);
const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

export const STDERR_EXCERPT_LENGTH = 500;

export interface GzipPartParams {
  partPath: string;
  transformMeta: string;
  outputFile: string;
  engine: TransformEngine;
  logger: StageLogger;
}

export function engineFailureMessage(response: TransformResponse, subject?: string): string {
  const target = subject ? ` on ${subject}` : "";
  let message = `Canonizer failed${target} with exit code ${response.exitCode}`;
  if (response.stderr) {
    message += `: ${truncate(response.stderr, STDERR_EXCERPT_LENGTH)}`;
  }
  return message;
}

export async function readGzipText(filePath: string): Promise<string> {
  const compressed = await fs.readFile(filePath);
  const raw = await gunzipAsync(compressed);
  try {
    return strictUtf8.decode(raw);
  } catch (error) {
    throw new Error(`Part ${filePath} is not valid UTF-8: ${errorMessage(error)}`);
  }
}

/**
 * Pipes one gzip-compressed JSONL part through the engine and appends its
 * stdout to `outputFile`. Returns the number of lines the engine emitted.
 */
export async function transformGzipPart(params: GzipPartParams): Promise<number> {
  const partName = path.basename(params.partPath);
  params.logger.debug(`Transforming part: ${partName}`, { part: params.partPath });

  const input = await readGzipText(params.partPath);
  const response = await params.engine({ metaPath: params.transformMeta, input });

  if (response.exitCode !== 0) {
    throw new Error(engineFailureMessage(response, partName));
  }

  await appendText(params.outputFile, response.stdout);
  return countNewlines(response.stdout);
}
