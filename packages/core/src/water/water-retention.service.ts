import { Injectable, Logger } from "@nestjs/common";
import { RETENTION_FACTOR_TYPES } from "@habitlens/shared";
import type {
  BodyType,
  LifestyleRecord,
  RetentionFactor,
  RetentionLevel,
  RetentionPrediction,
} from "@habitlens/shared";
import { clamp, formatNumber, round } from "../common/numbers";

export const RETENTION_THRESHOLDS = {
  sodiumDailyMg: 750,
  lowWaterMl: 1500,
  suboptimalWaterMl: 2000,
  highWaterMl: 4500,
  poorSleepQuality: 3,
  shortSleepHours: 6,
  highStress: 7,
  moderateStress: 5,
} as const;

/** Multiplier on the summed score. Mixed builds lean slightly towards retention. */
export const BODY_TYPE_SENSITIVITY: Readonly<Record<BodyType, number>> = {
  ectomorph: 0.8,
  mesomorph: 1.0,
  endomorph: 1.3,
  mixed: 1.1,
};

const NEUTRAL_FACTOR: RetentionFactor = {
  type: "hydration",
  score: 0,
  description: "All tracked factors are within their typical ranges.",
  recommendation: "Keep up your current balance of hydration, sodium and rest.",
};

export function totalSodium(record: LifestyleRecord): number {
  return record.foodItems.reduce((sum, item) => sum + item.nutrition.sodium, 0);
}

export function sodiumFactor(record: LifestyleRecord): RetentionFactor | null {
  const sodium = totalSodium(record);
  if (sodium <= RETENTION_THRESHOLDS.sodiumDailyMg) return null;
  return {
    type: "sodium",
    score: 3,
    description: `Total sodium of ${formatNumber(sodium)}mg is above ${RETENTION_THRESHOLDS.sodiumDailyMg}mg for the day.`,
    recommendation:
      "Choose fresh or lower-sodium options for your next meals and pair them with potassium-rich vegetables and fruit.",
  };
}

export function hydrationFactor(record: LifestyleRecord): RetentionFactor | null {
  const water = record.waterIntake;
  const t = RETENTION_THRESHOLDS;
  if (water < t.lowWaterMl) {
    return {
      type: "hydration",
      score: 2,
      description: `Water intake of ${formatNumber(water)}ml is below ${t.lowWaterMl}ml.`,
      recommendation:
        "Spread 2 to 3 litres of water across the day; steady intake helps your body let go of held fluid.",
    };
  }
  if (water < t.suboptimalWaterMl) {
    return {
      type: "hydration",
      score: 1,
      description: `Water intake of ${formatNumber(water)}ml is slightly below the ${t.suboptimalWaterMl}ml guide.`,
      recommendation: "Add a glass or two of water to reach around 2 litres.",
    };
  }
  if (water > t.highWaterMl) {
    return {
      type: "hydration",
      score: 1,
      description: `Water intake of ${formatNumber(water)}ml is above ${t.highWaterMl}ml.`,
      recommendation:
        "Very large volumes can upset your electrolyte balance; spread intake out and include electrolytes after heavy sweating.",
    };
  }
  return null;
}

export function sleepFactor(record: LifestyleRecord): RetentionFactor | null {
  const sleep = record.sleep;
  if (!sleep) return null;
  const t = RETENTION_THRESHOLDS;
  const recommendation =
    "Protect a regular 7 to 9 hour sleep window; rest supports the hormones that regulate fluid balance.";
  if (sleep.quality <= t.poorSleepQuality) {
    return {
      type: "sleep",
      score: 2,
      description: `Sleep quality was rated ${sleep.quality}/10.`,
      recommendation,
    };
  }
  if (sleep.duration < t.shortSleepHours) {
    return {
      type: "sleep",
      score: 1,
      description: `${formatNumber(sleep.duration)} hours of sleep is below ${t.shortSleepHours} hours.`,
      recommendation,
    };
  }
  return null;
}

export function stressFactor(record: LifestyleRecord): RetentionFactor | null {
  const intensities = record.habits.filter((h) => h.type === "stress").map((h) => h.intensity);
  if (intensities.length === 0) return null;
  const peak = Math.max(...intensities);
  const t = RETENTION_THRESHOLDS;
  const score = peak >= t.highStress ? 2 : peak >= t.moderateStress ? 1 : 0;
  if (score === 0) return null;
  return {
    type: "stress",
    score,
    description: `Stress intensity reached ${peak}/10.`,
    recommendation: "Short breathing or walking breaks can ease stress-related fluid retention.",
  };
}

function bandLevel(score: number): RetentionLevel {
  if (score <= 2) return "low";
  if (score <= 5) return "moderate";
  return "high";
}

/** Highest score first; equal scores follow the fixed factor priority. */
export function rankFactors(factors: readonly RetentionFactor[]): RetentionFactor[] {
  return [...factors].sort(
    (a, b) =>
      b.score - a.score ||
      RETENTION_FACTOR_TYPES.indexOf(a.type) - RETENTION_FACTOR_TYPES.indexOf(b.type),
  );
}

@Injectable()
export class WaterRetentionService {
  private readonly logger = new Logger(WaterRetentionService.name);

  predict(record: LifestyleRecord, bodyType: BodyType): RetentionPrediction {
    const contributing = rankFactors(
      [sodiumFactor(record), hydrationFactor(record), sleepFactor(record), stressFactor(record)].filter(
        (f): f is RetentionFactor => f !== null,
      ),
    );
    const rawScore = contributing.reduce((sum, f) => sum + f.score, 0);
    const multiplier = BODY_TYPE_SENSITIVITY[bodyType];
    const adjustedScore = round(rawScore * multiplier, 2);
    const level = bandLevel(adjustedScore);
    const primaryFactor = contributing.length > 0 ? contributing[0] : NEUTRAL_FACTOR;
    const confidence = this.confidence(contributing, adjustedScore);

    this.logger.debug(
      `Retention for ${record.userId}: raw ${rawScore}, adjusted ${adjustedScore} (${level})`,
    );

    let explanation =
      `Predicted ${level} water retention: a score of ${formatNumber(adjustedScore)} ` +
      `after the ${bodyType} sensitivity of x${multiplier}. ` +
      `Main factor: ${primaryFactor.description}`;
    if (contributing.length > 1) {
      explanation += ` Also contributing: ${contributing
        .slice(1)
        .map((f) => f.type)
        .join(", ")}.`;
    }
    explanation += ` ${primaryFactor.recommendation}`;

    return {
      level,
      confidence,
      rawScore,
      adjustedScore,
      bodyTypeMultiplier: multiplier,
      primaryFactor,
      contributingFactors: contributing,
      explanation,
    };
  }

  private confidence(ranked: readonly RetentionFactor[], adjustedScore: number): number {
    if (ranked.length === 0) return 0.6;
    if (ranked.length === 1) return 0.85;
    let confidence = 0.7 + 0.1 * (ranked[0].score - ranked[1].score);
    // Clear-cut totals at either end of the scale
    if (adjustedScore <= 1 || adjustedScore >= 7) confidence += 0.05;
    return round(clamp(confidence, 0.65, 0.95), 2);
  }
}
