import { afterEach, beforeEach, describe, expect, it } from "vitest";
import path from "path";
import { loadStageConfig } from "../src/config/loadConfig";
import { makeTempDir, removeDir, writeJsonFile } from "./helpers/vault";

describe("loadStageConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("resolves relative paths against the config file", async () => {
    const configPath = path.join(dir, "stage.json");
    await writeJsonFile(configPath, {
      repo_path: "../canonizer",
      venv_path: "../canonizer/.venv",
      input_dir: "vault",
      output_dir: "/data/canonical",
      transform_registry: "../canonizer/transforms",
      mappings: [{ source_pattern: "email/gmail", transform: "email/gmail_to_canonical_v1", output_name: "gmail" }]
    });

    expect(await loadStageConfig(configPath)).toEqual({
      repo_path: path.resolve(dir, "../canonizer"),
      venv_path: path.resolve(dir, "../canonizer/.venv"),
      input_dir: path.join(dir, "vault"),
      output_dir: "/data/canonical",
      transform_registry: path.resolve(dir, "../canonizer/transforms"),
      mappings: [{ source_pattern: "email/gmail", transform: "email/gmail_to_canonical_v1", output_name: "gmail" }]
    });
  });

  it("defaults mappings to an empty list", async () => {
    const configPath = path.join(dir, "stage.json");
    await writeJsonFile(configPath, {
      repo_path: "r",
      venv_path: "v",
      input_dir: "i",
      output_dir: "o",
      transform_registry: "t"
    });

    expect((await loadStageConfig(configPath)).mappings).toEqual([]);
  });

  it("rejects configs missing required keys", async () => {
    const configPath = path.join(dir, "stage.json");
    await writeJsonFile(configPath, { repo_path: "r", venv_path: "v", input_dir: "i", output_dir: "o" });

    await expect(loadStageConfig(configPath)).rejects.toThrow(
      `Stage config ${configPath} failed validation: transform_registry Required`
    );
  });

  it("rejects a non-positive timeout", async () => {
    const configPath = path.join(dir, "stage.json");
    await writeJsonFile(configPath, {
      repo_path: "r",
      venv_path: "v",
      input_dir: "i",
      output_dir: "o",
      transform_registry: "t",
      timeout_ms: 0
    });

    await expect(loadStageConfig(configPath)).rejects.toThrow("timeout_ms Number must be greater than 0");
  });
});
