import { Injectable, Logger } from "@nestjs/common";
import { ANALYSIS_SOURCES, PRIORITIES } from "@habitlens/shared";
import type {
  AnalysisResult,
  BodyTypeInsight,
  FoodCategory,
  FoodClassification,
  Insight,
  InsightCategory,
  Priority,
  RetentionLevel,
  RetentionPrediction,
  SleepAnalysis,
  SleepQualityBand,
  TrendAnalysis,
} from "@habitlens/shared";
import { round } from "../common/numbers";
import { metricLabel } from "../trends/metrics";

export const PRIORITY_RULES = {
  highConfidence: 0.75,
  highSeverity: 0.6,
  mediumConfidence: 0.5,
  /** Token overlap above which two rationales count as the same insight */
  duplicateSimilarity: 0.9,
} as const;

/** An insight before ids, priority and cross-links are assigned. */
interface Draft {
  title: string;
  summary: string;
  detail: string;
  rationale: string[];
  category: InsightCategory;
  source: AnalysisResult["source"];
  confidence: number;
  severity: number;
  actionable: boolean;
  /** Disruptor or primary-factor results always rank high */
  flagged: boolean;
  /** What the insight is about; only drafts on the same subject can be duplicates */
  subject: string;
}

const FOOD_SEVERITY: Record<FoodCategory, number> = {
  healthy: 0.1,
  junk: 0.7,
  preservative_heavy: 0.6,
};

const FOOD_LABELS: Record<FoodCategory, string> = {
  healthy: "a healthy choice",
  junk: "junk food",
  preservative_heavy: "preservative-heavy",
};

const RETENTION_SEVERITY: Record<RetentionLevel, number> = {
  low: 0.2,
  moderate: 0.5,
  high: 0.8,
};

const SLEEP_SEVERITY: Record<SleepQualityBand, number> = {
  poor: 0.8,
  fair: 0.5,
  good: 0.2,
  excellent: 0.1,
};

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function humanize(value: string): string {
  return value.replace(/_/g, " ");
}

function fromFood(food: FoodClassification): Draft[] {
  return [
    {
      title: `${food.foodName} is ${FOOD_LABELS[food.category]}`,
      summary: `${food.foodName} was classified as ${FOOD_LABELS[food.category]}.`,
      detail: food.rationale,
      rationale: [food.rationale, ...food.notices.map((n) => n.message)],
      category: "nutrition",
      source: "food",
      confidence: food.confidence,
      severity: FOOD_SEVERITY[food.category],
      actionable: food.category !== "healthy",
      flagged: false,
      subject: food.foodName.toLowerCase(),
    },
  ];
}

function fromWater(prediction: RetentionPrediction): Draft[] {
  const { primaryFactor } = prediction;
  return [
    {
      title: `${capitalize(prediction.level)} water retention predicted`,
      summary: primaryFactor.score > 0 ? primaryFactor.description : "No retention factors stood out today.",
      detail: prediction.explanation,
      rationale: (prediction.contributingFactors.length > 0
        ? prediction.contributingFactors
        : [primaryFactor]
      ).map((f) => f.description),
      category: "hydration",
      source: "water",
      confidence: prediction.confidence,
      severity: RETENTION_SEVERITY[prediction.level],
      actionable: prediction.level !== "low",
      flagged: primaryFactor.score > 0 && prediction.level !== "low",
      subject: "water retention",
    },
  ];
}

function fromSleep(sleep: SleepAnalysis, confidence: number): Draft[] {
  const negative = sleep.correlations.find((c) => c.impact === "negative");
  const drafts: Draft[] = [
    {
      title: `Sleep quality was ${sleep.overallQuality}`,
      summary: negative
        ? `${negative.habit} is associated with ${negative.outcome}.`
        : "No logged habit stood out as working against your sleep.",
      detail: sleep.explanation,
      rationale:
        sleep.correlations.length > 0
          ? sleep.correlations.map((c) => `${c.habit}: ${c.impact} (strength ${c.strength}/10)`)
          : [sleep.explanation],
      category: "sleep_recovery",
      source: "sleep",
      confidence,
      severity: SLEEP_SEVERITY[sleep.overallQuality],
      actionable: sleep.recommendations.length > 0,
      flagged: false,
      subject: "sleep quality",
    },
  ];
  for (const disruptor of sleep.disruptors) {
    drafts.push({
      title: `Sleep disruptor: ${humanize(disruptor.type)}`,
      summary: disruptor.recommendation,
      detail: `${capitalize(humanize(disruptor.type))} was identified as a sleep disruptor (${disruptor.timing}).`,
      rationale: [`${capitalize(humanize(disruptor.type))} severity ${disruptor.severity}/10 at ${disruptor.timing}`],
      category: "sleep_recovery",
      source: "sleep",
      confidence,
      severity: round(disruptor.severity / 10, 2),
      actionable: true,
      flagged: true,
      subject: disruptor.type,
    });
  }
  return drafts;
}

function fromBodyType(insight: BodyTypeInsight): Draft[] {
  return [
    {
      title: `How a ${insight.bodyType} body uses energy`,
      summary: insight.metabolicResponse,
      detail: [insight.metabolicResponse, insight.fatStoragePattern, insight.energyUtilization].join(" "),
      rationale: insight.recommendations.length > 0 ? [...insight.recommendations] : [insight.metabolicResponse],
      category: "metabolism",
      source: "body_type",
      confidence: insight.confidence,
      severity: 0.3,
      actionable: true,
      flagged: false,
      subject: insight.bodyType,
    },
  ];
}

function fromTrend(trend: TrendAnalysis): Draft[] {
  const drafts: Draft[] = [];
  for (const pattern of trend.patterns) {
    if (pattern.trend === "stable") continue;
    drafts.push({
      title: `${capitalize(metricLabel(pattern.metric))} is ${pattern.trend}`,
      summary: pattern.description,
      detail: `${pattern.description} Based on ${pattern.sampleSize} entries.`,
      rationale: [pattern.description],
      category: "lifestyle_patterns",
      source: "trend",
      confidence: pattern.confidence,
      severity: 0.3,
      actionable: false,
      flagged: false,
      subject: pattern.metric,
    });
  }
  for (const change of trend.changes) {
    drafts.push({
      title: `Change in ${metricLabel(change.metric)}`,
      summary: change.description,
      detail:
        change.possibleCauses.length > 0
          ? `${change.description} At the same time: ${change.possibleCauses.join("; ")}.`
          : change.description,
      rationale: [change.description, ...change.possibleCauses],
      category: "lifestyle_patterns",
      source: "trend",
      confidence: trend.confidence,
      severity: round(Math.min(1, Math.abs(change.percentChange) / 100), 2),
      actionable: change.possibleCauses.length > 0,
      flagged: false,
      subject: change.metric,
    });
  }
  for (const correlation of trend.correlations) {
    if (correlation.causality === "unlikely") continue;
    drafts.push({
      title: `${capitalize(metricLabel(correlation.metricA))} and ${metricLabel(correlation.metricB)}`,
      summary: correlation.description,
      detail: `${correlation.description} Seen across ${correlation.sampleSize} days.`,
      rationale: [correlation.description],
      category: "lifestyle_patterns",
      source: "trend",
      confidence: round(Math.abs(correlation.strength), 2),
      severity: 0.4,
      actionable: true,
      flagged: false,
      subject: `${correlation.metricA}/${correlation.metricB}`,
    });
  }
  return drafts;
}

function draftsFor(result: AnalysisResult): Draft[] {
  switch (result.source) {
    case "food":
      return fromFood(result.data);
    case "water":
      return fromWater(result.data);
    case "sleep":
      return fromSleep(result.data, result.confidence);
    case "body_type":
      return fromBodyType(result.data);
    case "trend":
      return fromTrend(result.data);
  }
}

export function assignPriority(draft: Pick<Draft, "confidence" | "severity" | "actionable" | "flagged">): Priority {
  const r = PRIORITY_RULES;
  if (draft.flagged || (draft.confidence >= r.highConfidence && draft.severity >= r.highSeverity)) {
    return "high";
  }
  if (draft.confidence >= r.mediumConfidence && draft.actionable) return "medium";
  return "low";
}

function tokens(lines: readonly string[]): Set<string> {
  return new Set(
    lines
      .join(" ")
      .toLowerCase()
      .split(/[^a-z0-9.]+/)
      .filter((t) => t.length > 0),
  );
}

/** Jaccard overlap of the words in two rationales. */
export function rationaleSimilarity(a: readonly string[], b: readonly string[]): number {
  const left = tokens(a);
  const right = tokens(b);
  if (left.size === 0 && right.size === 0) return 1;
  let shared = 0;
  for (const t of left) if (right.has(t)) shared++;
  return shared / (left.size + right.size - shared);
}

function isDuplicate(a: Draft, b: Draft): boolean {
  return (
    a.category === b.category &&
    a.subject === b.subject &&
    rationaleSimilarity(a.rationale, b.rationale) >= PRIORITY_RULES.duplicateSimilarity
  );
}

@Injectable()
export class InsightGeneratorService {
  private readonly logger = new Logger(InsightGeneratorService.name);

  /** Merges every analyzer result into deduplicated, prioritised insights. */
  generate(results: readonly AnalysisResult[]): Insight[] {
    const drafts = results.flatMap(draftsFor);

    const kept = drafts.reduce<Draft[]>((acc, draft) => {
      const index = acc.findIndex((existing) => isDuplicate(existing, draft));
      if (index === -1) return [...acc, draft];
      return acc[index].confidence >= draft.confidence
        ? acc
        : acc.map((existing, i) => (i === index ? draft : existing));
    }, []);

    const insights = kept.map(
      ({ flagged, subject: _subject, ...draft }, i): Insight => ({
        ...draft,
        id: `insight-${i + 1}`,
        priority: assignPriority({ ...draft, flagged }),
        relatedInsights: kept
          .filter((other, j) => j !== i && other.category === draft.category)
          .map((other) => other.title),
      }),
    );

    this.logger.debug(
      `Generated ${insights.length} insight(s) from ${results.length} result(s), ${drafts.length - kept.length} duplicate(s) dropped`,
    );
    return this.prioritize(insights);
  }

  /** High before medium before low, then confidence, then analyzer order. Stable. */
  prioritize(insights: readonly Insight[]): Insight[] {
    return [...insights].sort(
      (a, b) =>
        PRIORITIES.indexOf(a.priority) - PRIORITIES.indexOf(b.priority) ||
        b.confidence - a.confidence ||
        ANALYSIS_SOURCES.indexOf(a.source) - ANALYSIS_SOURCES.indexOf(b.source),
    );
  }
}
