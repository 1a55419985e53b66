export interface StageErrorDetail {
  manifest: string;
  message: string;
}

export interface StageResultMetadata {
  transform_registry: string;
  mappings_applied: number;
  manifests_processed: number;
  errors: number;
  error_details: StageErrorDetail[];
}

export interface StageResult {
  stage_name: string;
  success: boolean;
  duration_seconds: number;
  records_processed: number;
  output_files: string[];
  error_message: string | null;
  metadata: StageResultMetadata;
}
