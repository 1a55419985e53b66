import { describe, expect, it } from "vitest";
import { summarizeOutcomes, toOutcomeError } from "../src/stage/outcome";

describe("summarizeOutcomes", () => {
  it("sums records over successful manifests", () => {
    const summary = summarizeOutcomes(
      [
        { status: "ok", manifest: "/v/a/manifest.json", records: 3 },
        { status: "ok", manifest: "/v/b/manifest.json", records: 0 }
      ],
      1
    );

    expect(summary).toEqual({ success: true, records: 3, manifestsProcessed: 2, errors: [], errorMessage: null });
  });

  it("treats partial failure as success while output exists", () => {
    const summary = summarizeOutcomes(
      [
        { status: "ok", manifest: "/v/a/manifest.json", records: 2 },
        { status: "error", manifest: "/v/b/manifest.json", error: { message: "bad part" } }
      ],
      1
    );

    expect(summary.success).toBe(true);
    expect(summary.errorMessage).toBeNull();
    expect(summary.errors).toEqual([
      { manifest: "/v/b/manifest.json", message: "Failed to transform manifest /v/b/manifest.json: bad part" }
    ]);
  });

  it("fails when errors occurred and there is no output", () => {
    const summary = summarizeOutcomes(
      [
        { status: "error", manifest: "/v/a/manifest.json", error: { message: "first" } },
        { status: "error", manifest: "/v/b/manifest.json", error: { message: "second" } }
      ],
      0
    );

    expect(summary.success).toBe(false);
    expect(summary.errorMessage).toBe("2 transform(s) failed: Failed to transform manifest /v/a/manifest.json: first");
  });

  it("succeeds with no outcomes and no output", () => {
    expect(summarizeOutcomes([], 0).success).toBe(true);
  });
});

describe("toOutcomeError", () => {
  it("keeps the message and stack of errors", () => {
    const error = new Error("nope");
    expect(toOutcomeError(error)).toEqual({ message: "nope", stack: error.stack });
  });

  it("stringifies anything else", () => {
    expect(toOutcomeError(42)).toEqual({ message: "42", stack: undefined });
  });
});
