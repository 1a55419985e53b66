import path from "path";
import { loadStageConfig } from "../config/loadConfig";
import { runCanonizeStage } from "../stage/canonize";
import { writeJson } from "../utils/fs";
import { StageLogger } from "../utils/logger";
import { StageResult } from "../types/stageResult";

export interface RunOptions {
  configPath: string;
  reportPath?: string;
  logger: StageLogger;
}

export function formatStageSummary(result: StageResult): string {
  const status = result.success ? "ok" : "failed";
  const seconds = result.duration_seconds.toFixed(1);
  let line =
    `${result.stage_name}: ${status}, ${result.records_processed} records, ` +
    `${result.output_files.length} output file(s), ${result.metadata.errors} error(s) in ${seconds}s`;
  if (result.error_message) {
    line += ` (${result.error_message})`;
  }
  return line;
}

export async function runCanonize(options: RunOptions): Promise<StageResult> {
  const config = await loadStageConfig(options.configPath);
  const result = await runCanonizeStage(config, { logger: options.logger });

  if (options.reportPath) {
    const reportPath = path.resolve(options.reportPath);
    await writeJson(reportPath, result);
    options.logger.info(`Wrote stage report to ${reportPath}`);
  }

  console.log(formatStageSummary(result));
  if (!result.success) {
    process.exitCode = 1;
  }
  return result;
}
