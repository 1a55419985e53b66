import path from "path";
import { isDirectory, listSubdirectories, pathExists, readJson } from "../utils/fs";
import { latestMarkerPath, runManifestPath, sourceDir } from "../io/paths";
import { errorMessage } from "../utils/text";
import { StageLogger } from "../utils/logger";
import { LatestMarker } from "../types/latestMarker";

function markerField(data: Record<string, unknown>, key: string): string | null {
  const value = data[key];
  if (typeof value === "number") return value === 0 ? null : String(value);
  if (typeof value === "string" && value.length > 0) return value;
  return null;
}

export async function readLatestMarker(markerPath: string): Promise<LatestMarker | null> {
  const data = await readJson<unknown>(markerPath);
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error(`expected a JSON object, got ${Array.isArray(data) ? "array" : typeof data}`);
  }
  const record: Record<string, unknown> = { ...data };
  const dt = markerField(record, "dt");
  const runId = markerField(record, "run_id");
  if (!dt || !runId) return null;
  return { dt, run_id: runId };
}

/**
 * Resolves the manifest of the LATEST run for every account under
 * `<vaultRoot>/<sourcePath>`. Accounts without a usable marker are skipped;
 * there is no fallback to the most recent run on disk.
 */
export async function findManifests(
  vaultRoot: string,
  sourcePath: string,
  logger: StageLogger
): Promise<string[]> {
  const manifests: string[] = [];
  const root = sourceDir(vaultRoot, sourcePath);

  if (!(await isDirectory(root))) {
    return manifests;
  }

  for (const accountDir of await listSubdirectories(root)) {
    const account = path.basename(accountDir);
    const markerPath = latestMarkerPath(accountDir);

    if (!(await pathExists(markerPath))) {
      logger.debug(`No LATEST.json found in ${accountDir}, skipping`, { account });
      continue;
    }

    try {
      const marker = await readLatestMarker(markerPath);
      if (!marker) {
        logger.warn(`Invalid LATEST.json in ${accountDir}`, { account });
        continue;
      }

      const manifestPath = runManifestPath(accountDir, marker.dt, marker.run_id);
      if (!(await pathExists(manifestPath))) {
        logger.warn(`LATEST points to non-existent run: ${manifestPath}`, { account });
        continue;
      }

      manifests.push(manifestPath);
      logger.debug(`Found LATEST manifest for ${account}: ${marker.dt}/${marker.run_id}`, { account });
    } catch (error) {
      logger.warn(`Could not read LATEST.json in ${accountDir}: ${errorMessage(error)}`, { account });
    }
  }

  return manifests;
}
