import { NextResponse } from "next/server";
import { z } from "zod";

import { loadInsightsConfig, type InsightsConfig } from "@/lib/config";
import { JsonCurriculumStore, type CurriculumStore } from "@/lib/data/curriculum-store";
import { explainInsight } from "@/lib/domain/insight-explanations";
import type { InsightKind } from "@/types/curriculum";

export interface InsightsContext {
  config: InsightsConfig;
  store: CurriculumStore;
}

export interface UserRouteContext {
  params: Promise<{ userId: string }>;
}

export const userIdSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, "userId deve ser um inteiro não negativo.")
  .transform(Number);

export function createInsightsContext(): InsightsContext {
  const config = loadInsightsConfig();
  return { config, store: new JsonCurriculumStore(config.dataDir) };
}

export function insightResponse(kind: InsightKind, payload: Record<string, unknown>): NextResponse {
  return NextResponse.json({ insight: kind, explanation: explainInsight(kind), ...payload });
}

export function invalidInputResponse(message: string, issues: z.ZodIssue[]): NextResponse {
  return NextResponse.json({ error: message, issues }, { status: 400 });
}

export function failureResponse(message: string, error: unknown): NextResponse {
  console.error(message, error);
  return NextResponse.json(
    {
      error: message,
      details: error instanceof Error ? error.message : String(error)
    },
    { status: 500 }
  );
}
