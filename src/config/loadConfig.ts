import path from "path";
import { StageConfig, StageConfigSchema } from "./stageConfig";
import { readJson } from "../utils/fs";
import { parseWithSchema } from "../validation/parse";

const PATH_KEYS = ["repo_path", "venv_path", "input_dir", "output_dir", "transform_registry"] as const;

export function resolveConfigPaths(config: StageConfig, baseDir: string): StageConfig {
  const resolved = { ...config };
  for (const key of PATH_KEYS) {
    resolved[key] = path.resolve(baseDir, config[key]);
  }
  return resolved;
}

export async function loadStageConfig(configPath: string): Promise<StageConfig> {
  const absolutePath = path.resolve(configPath);
  const data = await readJson<unknown>(absolutePath);
  const config = parseWithSchema(StageConfigSchema, data, `Stage config ${absolutePath}`);
  return resolveConfigPaths(config, path.dirname(absolutePath));
}
