import { z } from "zod";

export const ScoringConfigSchema = z
  .object({
    overlap_weight: z.number().min(0).default(1 / 3),
    criticality_weight: z.number().min(0).default(1 / 3),
    ambiguity_weight: z.number().min(0).default(1 / 3),
  })
  .strict();

export const AnalysisConfigSchema = z
  .object({
    catalog_path: z.string().min(1).optional(),
    home_dir: z.string().min(1).optional(),
    unowned_criticality: z.number().positive().default(0.5),
    overlap_window_days: z.number().int().positive().default(30),
    scoring: ScoringConfigSchema.default({}),
  })
  .strict();

export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;
export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
