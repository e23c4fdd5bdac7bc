import path from "node:path";
import { z } from "zod";

import { DEFAULT_MAX_CYCLES } from "@/lib/domain/cycle-detector";
import { DEFAULT_LAYOUT_ITERATIONS, DEFAULT_LAYOUT_SEED } from "@/lib/domain/progress-layout";

const envSchema = z.object({
  CURRICULUM_DATA_DIR: z.string().trim().min(1).default("data/curriculum"),
  INSIGHTS_MAX_CYCLES: z.coerce.number().int().positive().default(DEFAULT_MAX_CYCLES),
  INSIGHTS_LAYOUT_SEED: z.coerce.number().int().nonnegative().default(DEFAULT_LAYOUT_SEED),
  INSIGHTS_LAYOUT_ITERATIONS: z.coerce.number().int().positive().default(DEFAULT_LAYOUT_ITERATIONS)
});

export interface InsightsConfig {
  dataDir: string;
  maxCycles: number;
  layoutSeed: number;
  layoutIterations: number;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadInsightsConfig(env: Partial<NodeJS.ProcessEnv> = process.env): InsightsConfig {
  const parsed = envSchema.safeParse({
    CURRICULUM_DATA_DIR: emptyToUndefined(env.CURRICULUM_DATA_DIR),
    INSIGHTS_MAX_CYCLES: emptyToUndefined(env.INSIGHTS_MAX_CYCLES),
    INSIGHTS_LAYOUT_SEED: emptyToUndefined(env.INSIGHTS_LAYOUT_SEED),
    INSIGHTS_LAYOUT_ITERATIONS: emptyToUndefined(env.INSIGHTS_LAYOUT_ITERATIONS)
  });

  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))];
    throw new Error(`Configuração inválida para: ${variables.join(", ")}`);
  }

  return {
    dataDir: path.resolve(process.cwd(), parsed.data.CURRICULUM_DATA_DIR),
    maxCycles: parsed.data.INSIGHTS_MAX_CYCLES,
    layoutSeed: parsed.data.INSIGHTS_LAYOUT_SEED,
    layoutIterations: parsed.data.INSIGHTS_LAYOUT_ITERATIONS
  };
}
