import type { BodyType, TimeRange } from "../lifestyle-types";

export const ANALYSIS_SOURCES = [
  "food",
  "water",
  "sleep",
  "body_type",
  "trend",
] as const;

export type AnalysisSource = (typeof ANALYSIS_SOURCES)[number];

export const PRIORITIES = ["high", "medium", "low"] as const;

export type Priority = (typeof PRIORITIES)[number];

export const ISSUE_KINDS = ["validation", "processing", "system"] as const;

export type IssueKind = (typeof ISSUE_KINDS)[number];

/** Plain-data form of a pipeline error: machine kind, readable message, what to do next. */
export interface PipelineIssue {
  kind: IssueKind;
  message: string;
  recovery: string;
  field?: string;
}

// Food classification

export const FOOD_CATEGORIES = ["healthy", "junk", "preservative_heavy"] as const;

export type FoodCategory = (typeof FOOD_CATEGORIES)[number];

export const FOOD_FACTORS = [
  "nutrient_density",
  "low_processing",
  "few_preservatives",
  "high_processing",
  "high_sugar",
  "high_sodium",
  "low_nutrient_density",
  "preservative_count",
  "preservative_load",
] as const;

export type FoodFactor = (typeof FOOD_FACTORS)[number];

export interface FoodParameters {
  nutrientDensity: number;
  /** 1 for minimally processed, 0 for ultra-processed */
  processingScore: number;
  processingLevel: number;
  preservativeCount: number;
  preservativeLoad: number;
  sugarContent: number;
  sodiumLevel: number;
}

export interface FoodClassification {
  foodName: string;
  category: FoodCategory;
  confidence: number;
  rationale: string;
  dominantFactors: FoodFactor[];
  parameters: FoodParameters;
  notices: PipelineIssue[];
}

// Water retention

export const RETENTION_LEVELS = ["low", "moderate", "high"] as const;

export type RetentionLevel = (typeof RETENTION_LEVELS)[number];

/** Listed in tie-break priority order. */
export const RETENTION_FACTOR_TYPES = [
  "sodium",
  "sleep",
  "hydration",
  "stress",
  "hormonal",
] as const;

export type RetentionFactorType = (typeof RETENTION_FACTOR_TYPES)[number];

export interface RetentionFactor {
  type: RetentionFactorType;
  score: number;
  description: string;
  recommendation: string;
}

export interface RetentionPrediction {
  level: RetentionLevel;
  confidence: number;
  rawScore: number;
  adjustedScore: number;
  bodyTypeMultiplier: number;
  primaryFactor: RetentionFactor;
  contributingFactors: RetentionFactor[];
  explanation: string;
}

// Sleep

export const SLEEP_QUALITY_BANDS = ["poor", "fair", "good", "excellent"] as const;

export type SleepQualityBand = (typeof SLEEP_QUALITY_BANDS)[number];

export const CORRELATION_IMPACTS = ["positive", "negative", "neutral"] as const;

export type CorrelationImpact = (typeof CORRELATION_IMPACTS)[number];

export const DISRUPTOR_TYPES = [
  "caffeine",
  "late_eating",
  "dehydration",
  "overhydration",
  "stress",
  "screen_time",
] as const;

export type DisruptorType = (typeof DISRUPTOR_TYPES)[number];

export interface SleepCorrelation {
  habit: string;
  /** The sleep outcome the habit is paired with in the explanation */
  outcome: string;
  impact: CorrelationImpact;
  /** 1 (weak) to 10 (strong) */
  strength: number;
}

export interface SleepDisruptor {
  type: DisruptorType;
  severity: number;
  timing: string;
  recommendation: string;
}

export interface SleepRecommendation {
  priority: Priority;
  action: string;
  rationale: string;
  expectedImpact: string;
}

export interface SleepAnalysis {
  overallQuality: SleepQualityBand;
  correlations: SleepCorrelation[];
  disruptors: SleepDisruptor[];
  recommendations: SleepRecommendation[];
  explanation: string;
  confidence: number;
}

// Body type

export const METABOLIC_RATES = ["fast", "moderate", "slow"] as const;

export type MetabolicRate = (typeof METABOLIC_RATES)[number];

/** Scale values run from 1 (low) to 10 (high). */
export interface MetabolicProfile {
  bodyType: BodyType;
  metabolicRate: MetabolicRate;
  baseMetabolicRate: number;
  carbSensitivity: number;
  fatStorageTendency: number;
  muscleGainPotential: number;
  recoverySpeed: number;
}

/** Percent of daily energy. */
export interface MacroRatios {
  protein: number;
  carbohydrates: number;
  fat: number;
}

export interface NutritionalNeeds {
  macroRatios: MacroRatios;
  mealFrequency: string;
  hydrationGuidance: string;
  dailyWaterTargetMl: { min: number; max: number };
}

export interface BodyTypeInsight {
  bodyType: BodyType;
  profile: MetabolicProfile;
  metabolicResponse: string;
  fatStoragePattern: string;
  energyUtilization: string;
  nutritionalNeeds: NutritionalNeeds;
  recommendations: string[];
  confidence: number;
}

// Trends

export const TREND_METRICS = [
  "water_intake",
  "sleep_quality",
  "sleep_duration",
  "calories",
  "sodium",
  "sugar",
  "caffeine",
  "stress",
  "exercise_minutes",
  "screen_time",
] as const;

export type TrendMetric = (typeof TREND_METRICS)[number];

export const TREND_TYPES = ["increasing", "decreasing", "stable", "cyclical"] as const;

export type TrendType = (typeof TREND_TYPES)[number];

export const CAUSALITY_LEVELS = ["likely", "possible", "unlikely"] as const;

export type CausalityLevel = (typeof CAUSALITY_LEVELS)[number];

export interface MetricPoint {
  timestamp: string;
  value: number;
}

export type MetricSeries = Partial<Record<TrendMetric, MetricPoint[]>>;

export interface TrendPattern {
  metric: TrendMetric;
  trend: TrendType;
  confidence: number;
  /** Repeat length in entries, cyclical patterns only */
  period?: number;
  sampleSize: number;
  description: string;
  timeRange: TimeRange;
}

export interface TrendCorrelation {
  metricA: TrendMetric;
  metricB: TrendMetric;
  strength: number;
  /** Entries by which metricA leads metricB (negative: metricB leads) */
  lag: number;
  sampleSize: number;
  signConsistency: number;
  causality: CausalityLevel;
  description: string;
}

export interface TrendChange {
  metric: TrendMetric;
  changePoint: string;
  baseline: number;
  value: number;
  magnitude: number;
  percentChange: number;
  description: string;
  possibleCauses: string[];
}

export interface ChartSeries {
  metric: TrendMetric;
  chartType: "line";
  points: MetricPoint[];
}

export interface TrendAnalysis {
  timeRange: TimeRange;
  patterns: TrendPattern[];
  correlations: TrendCorrelation[];
  changes: TrendChange[];
  visualizations: ChartSeries[];
  notices: PipelineIssue[];
  confidence: number;
}

// Tagged union over every analyzer output

export type AnalysisResult =
  | { source: "food"; confidence: number; data: FoodClassification }
  | { source: "water"; confidence: number; data: RetentionPrediction }
  | { source: "sleep"; confidence: number; data: SleepAnalysis }
  | { source: "body_type"; confidence: number; data: BodyTypeInsight }
  | { source: "trend"; confidence: number; data: TrendAnalysis };
