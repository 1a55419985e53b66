import { StageErrorDetail } from "../types/stageResult";
import { errorMessage } from "../utils/text";

export interface OutcomeError {
  message: string;
  stack?: string;
}

export type ManifestOutcome =
  | { status: "ok"; manifest: string; records: number }
  | { status: "error"; manifest: string; error: OutcomeError };

export interface OutcomeSummary {
  success: boolean;
  records: number;
  manifestsProcessed: number;
  errors: StageErrorDetail[];
  errorMessage: string | null;
}

export function toOutcomeError(error: unknown): OutcomeError {
  return {
    message: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined
  };
}

export function manifestFailureMessage(manifest: string, error: OutcomeError): string {
  return `Failed to transform manifest ${manifest}: ${error.message}`;
}

/**
 * Partial failure is still success: the stage only fails when something went
 * wrong and no canonical output exists at all.
 */
export function summarizeOutcomes(outcomes: ManifestOutcome[], outputFileCount: number): OutcomeSummary {
  let records = 0;
  let manifestsProcessed = 0;
  const errors: StageErrorDetail[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === "ok") {
      records += outcome.records;
      manifestsProcessed += 1;
    } else {
      errors.push({
        manifest: outcome.manifest,
        message: manifestFailureMessage(outcome.manifest, outcome.error)
      });
    }
  }

  const failed = errors.length > 0 && outputFileCount === 0;
  return {
    success: !failed,
    records,
    manifestsProcessed,
    errors,
    errorMessage: failed ? `${errors.length} transform(s) failed: ${errors[0].message}` : null
  };
}
