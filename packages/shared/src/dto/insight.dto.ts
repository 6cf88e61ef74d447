import { z } from "zod";
import { ANALYSIS_SOURCES, PRIORITIES } from "./analysis.dto";
import type { AnalysisSource, Priority } from "./analysis.dto";

export const INSIGHT_CATEGORIES = [
  "nutrition",
  "hydration",
  "sleep_recovery",
  "metabolism",
  "lifestyle_patterns",
] as const;

export type InsightCategory = (typeof INSIGHT_CATEGORIES)[number];

export const INSIGHT_CATEGORY_CONFIG: Record<
  InsightCategory,
  { label: string; healthRelated: boolean }
> = {
  nutrition: { label: "Nutrition", healthRelated: true },
  hydration: { label: "Hydration", healthRelated: true },
  sleep_recovery: { label: "Sleep & Recovery", healthRelated: true },
  metabolism: { label: "Metabolism", healthRelated: true },
  lifestyle_patterns: { label: "Lifestyle Patterns", healthRelated: false },
};

export interface Insight {
  id: string;
  title: string;
  summary: string;
  detail: string;
  /** Never empty */
  rationale: string[];
  priority: Priority;
  category: InsightCategory;
  source: AnalysisSource;
  confidence: number;
  /** 0 (informational) to 1 (needs attention) */
  severity: number;
  actionable: boolean;
  /** Titles of insights covering the same category */
  relatedInsights: string[];
}

export const CAUSE_EFFECT_CONFIDENCE = [
  "well_established",
  "supported",
  "theoretical",
] as const;

export type CauseEffectConfidence = (typeof CAUSE_EFFECT_CONFIDENCE)[number];

export interface CauseEffectPair {
  cause: string;
  effect: string;
  mechanism: string;
  confidence: CauseEffectConfidence;
}

export interface EducationalContent {
  insightId: string;
  category: InsightCategory;
  mainMessage: string;
  explanation: string;
  causeEffect: CauseEffectPair[];
  disclaimer: string | null;
}

// Schemas for stored insights, read back after decryption

export const insightSchema: z.ZodType<Insight> = z.object({
  id: z.string(),
  title: z.string(),
  summary: z.string(),
  detail: z.string(),
  rationale: z.array(z.string()).min(1),
  priority: z.enum(PRIORITIES),
  category: z.enum(INSIGHT_CATEGORIES),
  source: z.enum(ANALYSIS_SOURCES),
  confidence: z.number().min(0).max(1),
  severity: z.number().min(0).max(1),
  actionable: z.boolean(),
  relatedInsights: z.array(z.string()),
});

export const educationalContentSchema: z.ZodType<EducationalContent> = z.object({
  insightId: z.string(),
  category: z.enum(INSIGHT_CATEGORIES),
  mainMessage: z.string(),
  explanation: z.string(),
  causeEffect: z.array(
    z.object({
      cause: z.string().min(1),
      effect: z.string().min(1),
      mechanism: z.string().min(1),
      confidence: z.enum(CAUSE_EFFECT_CONFIDENCE),
    }),
  ),
  disclaimer: z.string().nullable(),
});
