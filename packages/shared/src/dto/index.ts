import { z } from "zod";
import {
  BODY_TYPES,
  lifestyleRecordSchema,
  timeRangeSchema,
} from "../lifestyle-types";
import type { AnalysisResult, PipelineIssue } from "./analysis.dto";
import type { EducationalContent, Insight } from "./insight.dto";

export * from "./analysis.dto";
export * from "./insight.dto";
export * from "./privacy.dto";

// Pipeline DTOs
export const pipelineRequestDto = z.object({
  record: lifestyleRecordSchema,
  bodyType: z.enum(BODY_TYPES),
  // Caller-supplied history snapshot; when absent the history repository is queried
  history: z.array(lifestyleRecordSchema).optional(),
  timeRange: timeRangeSchema.optional(),
});

// Inferred types
export type PipelineRequestDto = z.infer<typeof pipelineRequestDto>;

// Response types
export interface PipelineReport {
  userId: string;
  generatedAt: string;
  results: AnalysisResult[];
  insights: Insight[];
  content: EducationalContent[];
  notices: PipelineIssue[];
}

export interface FieldError {
  field: string;
  message: string;
  suggestedFix: string;
}

export type ValidationResult<T> =
  | { valid: true; errors: []; value: T }
  | { valid: false; errors: FieldError[] };
