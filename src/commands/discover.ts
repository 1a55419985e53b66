import { loadStageConfig } from "../config/loadConfig";
import { findManifests } from "../vault/findManifests";
import { StageLogger } from "../utils/logger";

export interface DiscoverOptions {
  configPath: string;
  logger: StageLogger;
}

export interface DiscoveredSource {
  source_pattern: string;
  transform: string;
  manifests: string[];
}

export async function discoverSources(options: DiscoverOptions): Promise<DiscoveredSource[]> {
  const config = await loadStageConfig(options.configPath);
  const discovered: DiscoveredSource[] = [];
  for (const mapping of config.mappings) {
    const manifests = await findManifests(config.input_dir, mapping.source_pattern, options.logger);
    discovered.push({
      source_pattern: mapping.source_pattern,
      transform: mapping.transform,
      manifests: manifests.sort()
    });
  }
  return discovered;
}

export async function runDiscover(options: DiscoverOptions): Promise<void> {
  const discovered = await discoverSources(options);
  console.log(JSON.stringify(discovered, null, 2));
}
