import { Injectable, Logger } from "@nestjs/common";
import type {
  BodyType,
  BodyTypeInsight,
  LifestyleRecord,
  MacroRatios,
  MetabolicProfile,
  MetabolicRate,
  NutritionalNeeds,
} from "@habitlens/shared";
import { formatNumber, mean, round } from "../common/numbers";
import { BODY_TYPE_TRAITS, PURE_BODY_TYPES } from "./profiles";
import type { BodyTypeTraits, MetabolicScales } from "./profiles";

export const LIFESTYLE_LIMITS = {
  lowCalories: 1800,
  lowProtein: 60,
  highCarbohydrates: 200,
  highSugar: 50,
  /** Percentage points between actual and target before a macro is called out */
  macroGap: 5,
} as const;

const SCALE_KEYS = [
  "baseMetabolicRate",
  "carbSensitivity",
  "fatStorageTendency",
  "muscleGainPotential",
  "recoverySpeed",
] as const;

const MACRO_LABELS: Record<keyof MacroRatios, string> = {
  protein: "protein",
  carbohydrates: "carbohydrates",
  fat: "fat",
};

function averageOf<T>(pick: (traits: BodyTypeTraits) => T, combine: (values: T[]) => T): T {
  return combine(PURE_BODY_TYPES.map((type) => pick(BODY_TYPE_TRAITS[type])));
}

function roundToNearest(value: number, step: number): number {
  return Math.round(value / step) * step;
}

// MIXED sits between the three pure profiles on every numeric axis
const MIXED_TRAITS: BodyTypeTraits = {
  scales: averageOf(
    (t) => t.scales,
    (all) => {
      const scales: MetabolicScales = { ...all[0] };
      for (const key of SCALE_KEYS) scales[key] = round(mean(all.map((s) => s[key])), 1);
      return scales;
    },
  ),
  macroRatios: averageOf(
    (t) => t.macroRatios,
    (all) => ({
      protein: round(mean(all.map((m) => m.protein)), 1),
      carbohydrates: round(mean(all.map((m) => m.carbohydrates)), 1),
      fat: round(mean(all.map((m) => m.fat)), 1),
    }),
  ),
  waterTargetMl: averageOf(
    (t) => t.waterTargetMl,
    (all) => ({
      min: roundToNearest(mean(all.map((w) => w.min)), 50),
      max: roundToNearest(mean(all.map((w) => w.max)), 50),
    }),
  ),
  mealFrequency: "4-5 meals a day, adjusted to hunger and activity",
  hydrationGuidance:
    "Aim for a steady intake through the day and add more on active or hot days.",
  metabolism:
    "Your body combines traits of several types, so your metabolism sits between fast and slow.",
  fatStorage:
    "Fat storage is moderate and depends more on daily habits than on a strong natural tendency.",
  energy:
    "Energy responds to a mix of carbohydrates, protein and fats; balanced meals keep it most even.",
  recommendations: [
    "Notice which meals keep your energy steady and build on them",
    "Keep a balanced plate of protein, carbohydrates and fats",
  ],
};

export function traitsFor(bodyType: BodyType): BodyTypeTraits {
  return bodyType === "mixed" ? MIXED_TRAITS : BODY_TYPE_TRAITS[bodyType];
}

function metabolicRate(baseMetabolicRate: number): MetabolicRate {
  if (baseMetabolicRate >= 7) return "fast";
  if (baseMetabolicRate <= 4) return "slow";
  return "moderate";
}

export interface DayTotals {
  calories: number;
  protein: number;
  carbohydrates: number;
  fat: number;
  sugar: number;
}

function dayTotals(record: LifestyleRecord): DayTotals {
  const totals: DayTotals = { calories: 0, protein: 0, carbohydrates: 0, fat: 0, sugar: 0 };
  for (const { nutrition } of record.foodItems) {
    totals.calories += nutrition.calories;
    totals.protein += nutrition.protein;
    totals.carbohydrates += nutrition.carbohydrates;
    totals.fat += nutrition.fat;
    totals.sugar += nutrition.sugar;
  }
  return totals;
}

/**
 * Compares the day's energy split against the target ratios and names the
 * macronutrient furthest off. Null when nothing with macro energy was logged.
 */
export function macroGapLine(totals: DayTotals, target: MacroRatios): string | null {
  const energy = {
    protein: totals.protein * 4,
    carbohydrates: totals.carbohydrates * 4,
    fat: totals.fat * 9,
  };
  const sum = energy.protein + energy.carbohydrates + energy.fat;
  if (sum <= 0) return null;

  const actual: MacroRatios = {
    protein: Math.round((energy.protein / sum) * 100),
    carbohydrates: Math.round((energy.carbohydrates / sum) * 100),
    fat: Math.round((energy.fat / sum) * 100),
  };
  const split = `${actual.protein}% protein, ${actual.carbohydrates}% carbohydrates and ${actual.fat}% fat`;

  let widest: keyof MacroRatios = "protein";
  for (const key of ["carbohydrates", "fat"] as const) {
    if (Math.abs(actual[key] - target[key]) > Math.abs(actual[widest] - target[widest])) widest = key;
  }
  const gap = actual[widest] - target[widest];
  if (Math.abs(gap) < LIFESTYLE_LIMITS.macroGap) {
    return `Today's energy split of ${split} is close to your target`;
  }
  return (
    `Today's energy split was ${split}; aim for ${gap < 0 ? "more" : "less"} ` +
    `${MACRO_LABELS[widest]} to approach your ${formatNumber(target[widest])}% target`
  );
}

@Injectable()
export class BodyTypeAnalyzerService {
  private readonly logger = new Logger(BodyTypeAnalyzerService.name);

  getMetabolicProfile(bodyType: BodyType): MetabolicProfile {
    const { scales } = traitsFor(bodyType);
    return {
      bodyType,
      metabolicRate: metabolicRate(scales.baseMetabolicRate),
      ...scales,
    };
  }

  analyze(bodyType: BodyType, record: LifestyleRecord): BodyTypeInsight {
    const traits = traitsFor(bodyType);
    const profile = this.getMetabolicProfile(bodyType);
    const logged = record.foodItems.length > 0;
    const totals = dayTotals(record);
    const limits = LIFESTYLE_LIMITS;

    let metabolicResponse = traits.metabolism;
    let fatStoragePattern = traits.fatStorage;
    let energyUtilization = traits.energy;
    const recommendations = [...traits.recommendations];

    if (logged) {
      if (profile.baseMetabolicRate >= 7 && totals.calories < limits.lowCalories) {
        metabolicResponse += ` Today's ${formatNumber(totals.calories)} kcal may be low for a fast metabolism.`;
        recommendations.push("Add a calorie-dense snack to cover what a fast metabolism burns");
      }
      if (profile.muscleGainPotential >= 7 && totals.protein < limits.lowProtein) {
        metabolicResponse += ` More than today's ${formatNumber(totals.protein)}g of protein would support your muscle-building potential.`;
        recommendations.push("Increase protein to support muscle maintenance");
      }
      if (profile.carbSensitivity >= 7 && totals.carbohydrates > limits.highCarbohydrates) {
        fatStoragePattern += ` Today's ${formatNumber(totals.carbohydrates)}g of carbohydrates is on the high side for your carb sensitivity.`;
        recommendations.push("Moderate carbohydrate portions and favour complex carbohydrates");
      }
      if (profile.carbSensitivity >= 5 && totals.sugar > limits.highSugar) {
        energyUtilization += ` Today's ${formatNumber(totals.sugar)}g of sugar can bring energy crashes.`;
        recommendations.push("Swap some sugar for protein to keep energy stable");
      }
      const gap = macroGapLine(totals, traits.macroRatios);
      if (gap) recommendations.push(gap);
    }

    this.logger.debug(`Body type ${bodyType} for ${record.userId}: ${recommendations.length} recommendation(s)`);

    return {
      bodyType,
      profile,
      metabolicResponse,
      fatStoragePattern,
      energyUtilization,
      nutritionalNeeds: this.nutritionalNeeds(traits, record.waterIntake),
      recommendations,
      confidence: bodyType === "mixed" ? 0.6 : 0.75,
    };
  }

  private nutritionalNeeds(traits: BodyTypeTraits, waterIntake: number): NutritionalNeeds {
    const { min, max } = traits.waterTargetMl;
    const position = waterIntake < min ? "below" : waterIntake > max ? "above" : "within";
    return {
      macroRatios: { ...traits.macroRatios },
      mealFrequency: traits.mealFrequency,
      hydrationGuidance: `${traits.hydrationGuidance} Today's ${formatNumber(waterIntake)}ml is ${position} your ${min}-${max}ml target.`,
      dailyWaterTargetMl: { min, max },
    };
  }
}
