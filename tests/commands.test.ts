import { afterEach, beforeEach, describe, expect, it } from "vitest";
import path from "path";
import { discoverSources } from "../src/commands/discover";
import { formatStageSummary } from "../src/commands/run";
import { findMapping } from "../src/commands/transformFile";
import { StageConfig } from "../src/config/stageConfig";
import { StageResult } from "../src/types/stageResult";
import { makeTempDir, RecordingLogger, removeDir, writeJsonFile, writeRun } from "./helpers/vault";

function result(overrides: Partial<StageResult>): StageResult {
  return {
    stage_name: "canonize",
    success: true,
    duration_seconds: 2,
    records_processed: 10,
    output_files: ["/out/email_gmail/alice.jsonl"],
    error_message: null,
    metadata: {
      transform_registry: "/registry",
      mappings_applied: 1,
      manifests_processed: 1,
      errors: 0,
      error_details: []
    },
    ...overrides
  };
}

describe("formatStageSummary", () => {
  it("summarizes a successful run", () => {
    expect(formatStageSummary(result({}))).toBe(
      "canonize: ok, 10 records, 1 output file(s), 0 error(s) in 2.0s"
    );
  });

  it("includes the failure message", () => {
    const failed = result({
      success: false,
      records_processed: 0,
      output_files: [],
      duration_seconds: 0,
      error_message: "1 transform(s) failed: boom",
      metadata: {
        transform_registry: "/registry",
        mappings_applied: 1,
        manifests_processed: 0,
        errors: 1,
        error_details: [{ manifest: "/m", message: "boom" }]
      }
    });
    expect(formatStageSummary(failed)).toBe(
      "canonize: failed, 0 records, 0 output file(s), 1 error(s) in 0.0s (1 transform(s) failed: boom)"
    );
  });
});

describe("findMapping", () => {
  const config: StageConfig = {
    repo_path: "/r",
    venv_path: "/v",
    input_dir: "/i",
    output_dir: "/o",
    transform_registry: "/t",
    mappings: [{ source_pattern: "email/gmail", transform: "email/gmail_v1", output_name: "gmail" }]
  };

  it("finds a mapping by source pattern", () => {
    expect(findMapping(config, "email/gmail").output_name).toBe("gmail");
  });

  it("throws for unknown patterns", () => {
    expect(() => findMapping(config, "chat/slack")).toThrow("No mapping configured for source pattern chat/slack");
  });
});

describe("discoverSources", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("lists sorted manifests per mapping", async () => {
    const vault = path.join(dir, "vault");
    const bob = await writeRun(vault, { dt: "2025-01-02", runId: "b", source: "email/gmail", account: "bob", parts: [] });
    const alice = await writeRun(vault, { dt: "2025-01-01", runId: "a", source: "email/gmail", account: "alice", parts: [] });
    const configPath = path.join(dir, "stage.json");
    await writeJsonFile(configPath, {
      repo_path: "canonizer",
      venv_path: "canonizer/.venv",
      input_dir: "vault",
      output_dir: "canonical",
      transform_registry: "canonizer/transforms",
      mappings: [
        { source_pattern: "email/gmail", transform: "email/gmail_v1" },
        { source_pattern: "chat/slack", transform: "chat/slack_v1" }
      ]
    });

    expect(await discoverSources({ configPath, logger: new RecordingLogger() })).toEqual([
      { source_pattern: "email/gmail", transform: "email/gmail_v1", manifests: [alice, bob] },
      { source_pattern: "chat/slack", transform: "chat/slack_v1", manifests: [] }
    ]);
  });
});
