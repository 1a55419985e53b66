import path from "path";

export const LATEST_MARKER = "LATEST.json";
export const MANIFEST_FILE = "manifest.json";
export const TRANSFORM_META_SUFFIX = ".meta.yaml";

export function sourceDir(vaultRoot: string, sourcePath: string): string {
  return path.join(vaultRoot, sourcePath);
}

export function latestMarkerPath(accountDir: string): string {
  return path.join(accountDir, LATEST_MARKER);
}

export function runDir(accountDir: string, dt: string, runId: string): string {
  return path.join(accountDir, `dt=${dt}`, `run_id=${runId}`);
}

export function runManifestPath(accountDir: string, dt: string, runId: string): string {
  return path.join(runDir(accountDir, dt, runId), MANIFEST_FILE);
}

export function transformMetaPath(transformRegistry: string, transformName: string): string {
  return path.join(transformRegistry, `${transformName}${TRANSFORM_META_SUFFIX}`);
}

export function canonizerBinPath(venvPath: string): string {
  return path.join(venvPath, "bin", "can");
}

// email/gmail -> email_gmail
export function sourceSlug(source: string): string {
  return source.replace(/\//g, "_");
}

export function canonicalOutputPath(outputDir: string, source: string, account: string): string {
  return path.join(outputDir, sourceSlug(source), `${account}.jsonl`);
}

export function datedOutputPath(outputDir: string, outputName: string, dateStamp: string): string {
  return path.join(outputDir, `${outputName}-${dateStamp}.jsonl`);
}
