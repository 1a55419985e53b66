import { z } from "zod";

const MappingSchema = z.object({
  source_pattern: z.string().min(1),
  transform: z.string().min(1),
  output_name: z.string().min(1).optional()
});

export const StageConfigSchema = z.object({
  repo_path: z.string(),
  venv_path: z.string(),
  input_dir: z.string(),
  output_dir: z.string(),
  transform_registry: z.string(),
  timeout_ms: z.number().int().positive().optional(),
  mappings: z.array(MappingSchema).default([])
});

export type StageConfig = z.infer<typeof StageConfigSchema>;
export type MappingConfig = z.infer<typeof MappingSchema>;

export const DEFAULT_OUTPUT_NAME = "canonical";
