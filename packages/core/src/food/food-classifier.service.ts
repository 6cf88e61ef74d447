import { Injectable, Logger } from "@nestjs/common";
import type {
  FoodCategory,
  FoodClassification,
  FoodFactor,
  FoodItem,
  FoodParameters,
  NutritionalInfo,
} from "@habitlens/shared";
import { ProcessingError } from "../common/errors";
import { clamp, formatNumber, round } from "../common/numbers";
import { preservativeSeverity } from "./preservatives";

export const FOOD_THRESHOLDS = {
  healthyMinDensity: 0.7,
  healthyMaxProcessing: 2,
  healthyMaxPreservatives: 3,
  junkMinProcessing: 4,
  junkMaxSugar: 15,
  junkMaxSodium: 600,
  junkMaxDensity: 0.3,
  heavyPreservativeCount: 3,
  heavyPreservativeLoad: 1.5,
} as const;

// Weighted grams of protein and fiber per 100 kcal that count as fully nutrient-dense
const FIBER_WEIGHT = 1.5;
const DENSITY_SCALE = 8;

/** Exact score ties resolve toward the earlier category. */
const CAUTION_ORDER: readonly FoodCategory[] = ["junk", "preservative_heavy", "healthy"];

const CATEGORY_LABELS: Record<FoodCategory, string> = {
  healthy: "healthy",
  junk: "junk food",
  preservative_heavy: "preservative-heavy",
};

interface Criterion {
  factor: FoodFactor;
  /** How far past the threshold, normalised to (0, 1] */
  excess: number;
  reason: string;
}

interface Candidate {
  category: FoodCategory;
  score: number;
  criteria: Criterion[];
}

export function nutrientDensity(nutrition: NutritionalInfo): number {
  const weighted = nutrition.protein + FIBER_WEIGHT * nutrition.fiber;
  if (nutrition.calories < 1) {
    // No energy to weigh against: nutrients present count as dense, nothing at all is neutral
    return weighted > 0 ? 1 : 0.5;
  }
  return round(Math.min(1, weighted / (nutrition.calories / 100) / DENSITY_SCALE), 3);
}

export function deriveParameters(item: FoodItem): FoodParameters {
  const n = item.nutrition;
  const load = n.preservatives.reduce((sum, p) => sum + preservativeSeverity(p), 0);
  return {
    nutrientDensity: nutrientDensity(n),
    processingScore: round((5 - n.processingLevel) / 4, 2),
    processingLevel: n.processingLevel,
    preservativeCount: n.preservatives.length,
    preservativeLoad: round(load, 2),
    sugarContent: n.sugar,
    sodiumLevel: n.sodium,
  };
}

function listPreservatives(names: readonly string[]): string {
  const shown = names.slice(0, 3).join(", ");
  const rest = names.length - 3;
  return rest > 0 ? `${shown} and ${rest} more` : shown;
}

function byCaution(a: Candidate, b: Candidate): number {
  return CAUTION_ORDER.indexOf(a.category) - CAUTION_ORDER.indexOf(b.category);
}

@Injectable()
export class FoodClassifierService {
  private readonly logger = new Logger(FoodClassifierService.name);

  classify(item: FoodItem): FoodClassification {
    const parameters = deriveParameters(item);
    const candidates = this.findCandidates(item, parameters);
    if (candidates.length === 0) {
      return this.closestMatch(item, parameters);
    }

    const [winner, ...others] = [...candidates].sort(
      (a, b) => b.score - a.score || byCaution(a, b),
    );
    const runnerUp = others.length > 0 ? others[0].score : 0;
    const confidence = round(clamp(0.6 + 0.35 * (winner.score - runnerUp), 0.6, 0.95), 2);

    let rationale = `Classified as ${CATEGORY_LABELS[winner.category]} because ${winner.criteria
      .map((c) => c.reason)
      .join(", ")}.`;
    if (others.length > 0) {
      const tied = others.some((o) => o.score === winner.score);
      rationale += ` Also met the ${others
        .map((o) => CATEGORY_LABELS[o.category])
        .join(" and ")} criteria; ${
        tied
          ? "the tie was resolved toward the more cautious category"
          : `${CATEGORY_LABELS[winner.category]} scored highest`
      }.`;
    }

    return {
      foodName: item.name,
      category: winner.category,
      confidence,
      rationale,
      dominantFactors: [...winner.criteria]
        .sort((a, b) => b.excess - a.excess)
        .map((c) => c.factor),
      parameters,
      notices: [],
    };
  }

  private findCandidates(item: FoodItem, p: FoodParameters): Candidate[] {
    const t = FOOD_THRESHOLDS;
    const candidates: Candidate[] = [];

    if (
      p.nutrientDensity > t.healthyMinDensity &&
      p.processingLevel <= t.healthyMaxProcessing &&
      p.preservativeCount < t.healthyMaxPreservatives
    ) {
      const criteria: Criterion[] = [
        {
          factor: "nutrient_density",
          excess: (p.nutrientDensity - t.healthyMinDensity) / (1 - t.healthyMinDensity),
          reason: `nutrient density ${formatNumber(p.nutrientDensity)} is above ${t.healthyMinDensity}`,
        },
        {
          factor: "low_processing",
          excess: (t.healthyMaxProcessing + 1 - p.processingLevel) / t.healthyMaxProcessing,
          reason: `processing level ${p.processingLevel} is at most ${t.healthyMaxProcessing}`,
        },
        {
          factor: "few_preservatives",
          excess: (t.healthyMaxPreservatives - p.preservativeCount) / t.healthyMaxPreservatives,
          reason: `${p.preservativeCount} preservatives is below ${t.healthyMaxPreservatives}`,
        },
      ];
      // Every healthy criterion must hold, so the weakest margin decides
      candidates.push({
        category: "healthy",
        score: round(Math.min(...criteria.map((c) => c.excess)), 4),
        criteria,
      });
    }

    const junk: Criterion[] = [];
    if (p.processingLevel >= t.junkMinProcessing) {
      junk.push({
        factor: "high_processing",
        excess: (p.processingLevel - (t.junkMinProcessing - 1)) / 2,
        reason: `processing level ${p.processingLevel} is at or above ${t.junkMinProcessing}`,
      });
    }
    if (p.sugarContent > t.junkMaxSugar && !item.isFruit) {
      junk.push({
        factor: "high_sugar",
        excess: Math.min(1, (p.sugarContent - t.junkMaxSugar) / t.junkMaxSugar),
        reason: `sugar ${formatNumber(p.sugarContent)}g exceeds ${t.junkMaxSugar}g`,
      });
    }
    if (p.sodiumLevel > t.junkMaxSodium) {
      junk.push({
        factor: "high_sodium",
        excess: Math.min(1, (p.sodiumLevel - t.junkMaxSodium) / t.junkMaxSodium),
        reason: `sodium ${formatNumber(p.sodiumLevel)}mg exceeds ${t.junkMaxSodium}mg`,
      });
    }
    if (p.nutrientDensity < t.junkMaxDensity) {
      junk.push({
        factor: "low_nutrient_density",
        excess: (t.junkMaxDensity - p.nutrientDensity) / t.junkMaxDensity,
        reason: `nutrient density ${formatNumber(p.nutrientDensity)} is below ${t.junkMaxDensity}`,
      });
    }
    if (junk.length > 0) {
      candidates.push({
        category: "junk",
        score: round(Math.max(...junk.map((c) => c.excess)), 4),
        criteria: junk,
      });
    }

    const heavy: Criterion[] = [];
    if (p.preservativeCount >= t.heavyPreservativeCount) {
      heavy.push({
        factor: "preservative_count",
        excess: Math.min(1, (p.preservativeCount - (t.heavyPreservativeCount - 1)) / 3),
        reason: `${p.preservativeCount} preservatives detected (${listPreservatives(
          item.nutrition.preservatives,
        )}) meets the limit of ${t.heavyPreservativeCount}`,
      });
    }
    if (p.preservativeLoad > t.heavyPreservativeLoad) {
      heavy.push({
        factor: "preservative_load",
        excess: Math.min(1, (p.preservativeLoad - t.heavyPreservativeLoad) / t.heavyPreservativeLoad),
        reason: `preservative load ${formatNumber(p.preservativeLoad)} exceeds ${t.heavyPreservativeLoad}`,
      });
    }
    if (heavy.length > 0) {
      candidates.push({
        category: "preservative_heavy",
        score: round(Math.max(...heavy.map((c) => c.excess)), 4),
        criteria: heavy,
      });
    }

    return candidates;
  }

  /** No threshold crossed: fall back to a weighted composite per category. */
  private closestMatch(item: FoodItem, p: FoodParameters): FoodClassification {
    const composite: Record<FoodCategory, number> = {
      healthy: round(
        0.5 * p.nutrientDensity +
          0.3 * p.processingScore +
          0.2 * (1 - Math.min(1, p.preservativeCount / 5)),
        4,
      ),
      junk: round(
        0.3 * (1 - p.processingScore) +
          0.25 * (item.isFruit ? 0 : Math.min(1, p.sugarContent / 30)) +
          0.25 * Math.min(1, p.sodiumLevel / 1000) +
          0.2 * (1 - p.nutrientDensity),
        4,
      ),
      preservative_heavy: round(Math.min(1, p.preservativeLoad / 3), 4),
    };
    const category = [...CAUTION_ORDER].sort(
      (a, b) => composite[b] - composite[a] || CAUTION_ORDER.indexOf(a) - CAUTION_ORDER.indexOf(b),
    )[0];
    const fallbackFactor: Record<FoodCategory, FoodFactor> = {
      healthy: "nutrient_density",
      junk: "low_nutrient_density",
      preservative_heavy: "preservative_load",
    };

    this.logger.warn(`No category threshold crossed for "${item.name}", using closest match`);

    return {
      foodName: item.name,
      category,
      confidence: 0.5,
      rationale:
        `No category threshold was crossed; closest match is ${CATEGORY_LABELS[category]} ` +
        `(nutrient density ${formatNumber(p.nutrientDensity)}, processing level ${p.processingLevel}, ` +
        `${p.preservativeCount} preservatives).`,
      dominantFactors: [fallbackFactor[category]],
      parameters: p,
      notices: [
        new ProcessingError(
          `"${item.name}" sits between categories, so it was classified by closest match.`,
          "Check the nutrition values or add missing details such as preservatives.",
        ).toIssue(),
      ],
    };
  }
}
