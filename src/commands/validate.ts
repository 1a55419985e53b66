import { loadStageConfig } from "../config/loadConfig";
import { validateCanonizeStage } from "../stage/canonize";

export interface ValidateOptions {
  configPath: string;
}

export async function runValidate(options: ValidateOptions): Promise<void> {
  const config = await loadStageConfig(options.configPath);
  await validateCanonizeStage(config);
  console.log(`Config ${options.configPath} is valid (${config.mappings.length} mapping(s)).`);
}
