import type { BodyType, MacroRatios } from "@habitlens/shared";

export type PureBodyType = Exclude<BodyType, "mixed">;

export const PURE_BODY_TYPES: readonly PureBodyType[] = ["ectomorph", "mesomorph", "endomorph"];

/** 1 (low) to 10 (high) */
export interface MetabolicScales {
  baseMetabolicRate: number;
  carbSensitivity: number;
  fatStorageTendency: number;
  muscleGainPotential: number;
  recoverySpeed: number;
}

export interface BodyTypeTraits {
  scales: MetabolicScales;
  macroRatios: MacroRatios;
  mealFrequency: string;
  hydrationGuidance: string;
  waterTargetMl: { min: number; max: number };
  metabolism: string;
  fatStorage: string;
  energy: string;
  recommendations: readonly string[];
}

export const BODY_TYPE_TRAITS: Readonly<Record<PureBodyType, BodyTypeTraits>> = {
  ectomorph: {
    scales: {
      baseMetabolicRate: 8,
      carbSensitivity: 3,
      fatStorageTendency: 2,
      muscleGainPotential: 4,
      recoverySpeed: 7,
    },
    macroRatios: { protein: 25, carbohydrates: 55, fat: 20 },
    mealFrequency: "5-6 smaller meals spread through the day",
    hydrationGuidance:
      "A fast metabolism uses more water; sip steadily through the day and add fluids around activity.",
    waterTargetMl: { min: 2500, max: 3000 },
    metabolism:
      "Your metabolism tends to run fast, burning through energy quickly even at rest.",
    fatStorage:
      "Your body stores little fat and tends to use surplus energy rather than keep it.",
    energy:
      "Carbohydrates are used efficiently for fuel, but energy can dip if meals are spaced too far apart.",
    recommendations: [
      "Eat regularly so a fast metabolism always has fuel available",
      "Favour calorie-dense whole foods such as nuts, whole grains and dairy",
    ],
  },
  mesomorph: {
    scales: {
      baseMetabolicRate: 6,
      carbSensitivity: 5,
      fatStorageTendency: 5,
      muscleGainPotential: 8,
      recoverySpeed: 8,
    },
    macroRatios: { protein: 30, carbohydrates: 45, fat: 25 },
    mealFrequency: "4-5 balanced meals a day",
    hydrationGuidance:
      "Keep intake steady and add a glass or two on training days to support recovery.",
    waterTargetMl: { min: 2000, max: 2500 },
    metabolism:
      "Your metabolism is moderate and responds readily to changes in activity and diet.",
    fatStorage:
      "Fat is stored evenly around the body and shifts fairly easily with activity.",
    energy:
      "Energy stays steady on balanced meals, with muscle readily using protein for repair.",
    recommendations: [
      "Keep protein at every meal to make the most of a strong muscle-building response",
      "Balance carbohydrates with activity: more on active days, fewer on rest days",
    ],
  },
  endomorph: {
    scales: {
      baseMetabolicRate: 4,
      carbSensitivity: 8,
      fatStorageTendency: 8,
      muscleGainPotential: 6,
      recoverySpeed: 5,
    },
    macroRatios: { protein: 35, carbohydrates: 25, fat: 40 },
    mealFrequency: "3 structured meals with a planned snack if needed",
    hydrationGuidance:
      "Water before meals helps with fullness; spread intake evenly rather than drinking a lot at once.",
    waterTargetMl: { min: 2000, max: 3000 },
    metabolism:
      "Your metabolism tends to run slower, so energy not used is kept in reserve more readily.",
    fatStorage:
      "Your body holds on to surplus energy as fat, often around the midsection.",
    energy:
      "Energy is steadiest on protein and fats; large servings of simple carbohydrates can lead to slumps.",
    recommendations: [
      "Build meals around protein and vegetables, with measured portions of starchy carbohydrates",
      "Choose whole, fibre-rich carbohydrates over refined ones",
    ],
  },
};
