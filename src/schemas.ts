import { z } from "zod";

export const LOOP_CATEGORIES = ["Discovery", "Refinement", "Asset", "Export"] as const;

export const LoopCategory = z.enum(LOOP_CATEGORIES);

export const LoopEntry = z.object({
  display_name: z.string().min(1),
  abbrev: z.string().min(1),
  category: LoopCategory,
  description: z.string(),
  next: z.array(z.string()).default([])
});

export const LoopCatalogFile = z.record(
  z.string().regex(/^[a-z0-9]+(-[a-z0-9]+)*$/, "loop ids must be kebab-case"),
  LoopEntry
);

export const SeedPolicy = z.enum(["require", "warn"]);

export const LogLevel = z.enum(["error", "warning", "info", "debug", "trace"]);

export const ProjectConfig = z
  .object({
    story_seed: z.string().optional(),
    run: z
      .object({
        seed_policy: SeedPolicy.optional()
      })
      .passthrough()
      .optional(),
    logging: z
      .object({
        level: z.string().optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

export const ProjectMetadata = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  version: z.string(),
  created_at: z.string().nullable(),
  layers: z.object({
    hot: z.string(),
    cold: z.string()
  })
});

export const IterationSummary = z.object({
  number: z.number().int().positive(),
  completed_steps: z.number().int().nonnegative(),
  blocked_steps: z.number().int().nonnegative(),
  revised_steps: z.number().int().nonnegative(),
  first_pass_steps: z.number().int().nonnegative(),
  duration: z.number().nonnegative(),
  stabilized: z.boolean(),
  showrunner_decision: z.string().nullable()
});

export const LoopSummary = z.object({
  loop_name: z.string(),
  iteration_count: z.number().int().nonnegative(),
  total_steps: z.number().int().nonnegative(),
  total_duration: z.number().nonnegative(),
  is_multi_iteration: z.boolean(),
  stabilized: z.boolean(),
  iterations: z.array(IterationSummary)
});

export type LoopCategory = z.infer<typeof LoopCategory>;
export type LoopEntry = z.infer<typeof LoopEntry>;
export type SeedPolicy = z.infer<typeof SeedPolicy>;
export type LogLevel = z.infer<typeof LogLevel>;
export type ProjectConfig = z.infer<typeof ProjectConfig>;
export type ProjectMetadata = z.infer<typeof ProjectMetadata>;
export type IterationSummary = z.infer<typeof IterationSummary>;
export type LoopSummary = z.infer<typeof LoopSummary>;
