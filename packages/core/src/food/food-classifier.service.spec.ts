import { FOOD_CATEGORIES } from "@habitlens/shared";
import { buildFood as food } from "../testing/lifestyle.fixtures";
import { FoodClassifierService, deriveParameters, nutrientDensity } from "./food-classifier.service";

const broccoli = food("Broccoli", {
  calories: 34,
  protein: 2.8,
  carbohydrates: 7,
  fat: 0.4,
  sodium: 33,
  sugar: 1.7,
  fiber: 2.6,
});

const saltySnack = food("Salted crisps", {
  calories: 500,
  protein: 6,
  fiber: 2,
  sodium: 900,
  sugar: 2,
  processingLevel: 4,
});

describe("FoodClassifierService", () => {
  let service: FoodClassifierService;

  beforeEach(() => {
    service = new FoodClassifierService();
  });

  describe("nutrientDensity", () => {
    it("caps dense foods at 1", () => {
      expect(nutrientDensity(broccoli.nutrition)).toBe(1);
    });

    it("weighs fiber above protein per 100 kcal", () => {
      expect(nutrientDensity(saltySnack.nutrition)).toBeCloseTo(0.225, 3);
    });

    it("treats zero-energy items without nutrients as neutral", () => {
      expect(nutrientDensity(food("Water", { calories: 0 }).nutrition)).toBe(0.5);
    });
  });

  describe("deriveParameters", () => {
    it("scores preservative load by severity", () => {
      const item = food("Ham", {
        preservatives: ["Sodium Nitrite", "  potassium   sorbate ", "mystery additive"],
      });
      const params = deriveParameters(item);
      expect(params.preservativeCount).toBe(3);
      expect(params.preservativeLoad).toBe(1.9);
      expect(params.processingScore).toBe(1);
    });
  });

  describe("classify", () => {
    it("classifies whole foods as healthy and names every threshold", () => {
      const result = service.classify(broccoli);
      expect(result.category).toBe("healthy");
      expect(result.confidence).toBe(0.95);
      expect(result.rationale).toBe(
        "Classified as healthy because nutrient density 1 is above 0.7, processing level 1 is at most 2, 0 preservatives is below 3.",
      );
      expect(result.dominantFactors).toEqual(["nutrient_density", "low_processing", "few_preservatives"]);
      expect(result.notices).toEqual([]);
    });

    it("classifies salty processed snacks as junk", () => {
      const result = service.classify(saltySnack);
      expect(result.category).toBe("junk");
      expect(result.rationale).toContain("processing level 4 is at or above 4");
      expect(result.rationale).toContain("sodium 900mg exceeds 600mg");
      expect(result.dominantFactors).toEqual(["high_processing", "high_sodium", "low_nutrient_density"]);
      expect(result.confidence).toBeGreaterThan(0.6);
      expect(result.confidence).toBeLessThanOrEqual(0.95);
    });

    it("resolves exact ties toward junk", () => {
      const result = service.classify(
        food("Cured sausage", {
          calories: 300,
          protein: 15,
          sodium: 1200,
          processingLevel: 3,
          preservatives: ["sodium nitrite", "sodium nitrate", "BHA"],
        }),
      );
      expect(result.category).toBe("junk");
      expect(result.confidence).toBe(0.6);
      expect(result.rationale).toBe(
        "Classified as junk food because sodium 1200mg exceeds 600mg. " +
          "Also met the preservative-heavy criteria; the tie was resolved toward the more cautious category.",
      );
    });

    it("picks the category with the larger threshold excess", () => {
      const result = service.classify(
        food("Deli slices", {
          calories: 300,
          protein: 15,
          sodium: 700,
          processingLevel: 3,
          preservatives: ["sodium nitrite", "sodium nitrate", "BHA"],
        }),
      );
      expect(result.category).toBe("preservative_heavy");
      expect(result.rationale).toBe(
        "Classified as preservative-heavy because 3 preservatives detected (sodium nitrite, sodium nitrate, BHA) meets the limit of 3, " +
          "preservative load 3 exceeds 1.5. Also met the junk food criteria; preservative-heavy scored highest.",
      );
      expect(result.dominantFactors).toEqual(["preservative_load", "preservative_count"]);
    });

    it("summarises long preservative lists", () => {
      const result = service.classify(
        food("Snack cake", {
          calories: 100,
          protein: 8,
          processingLevel: 3,
          preservatives: ["citric acid", "ascorbic acid", "sorbic acid", "calcium propionate", "bht"],
        }),
      );
      expect(result.category).toBe("preservative_heavy");
      expect(result.rationale).toContain("(citric acid, ascorbic acid, sorbic acid and 2 more)");
    });

    it("exempts fruit sugar from the sugar limit", () => {
      const apple = {
        calories: 95,
        protein: 0.5,
        fiber: 4.4,
        sugar: 19,
      };
      const asFruit = service.classify(food("Apple", apple, { isFruit: true }));
      expect(asFruit.category).toBe("healthy");
      expect(asFruit.rationale).not.toContain("sugar");

      const asSnack = service.classify(food("Apple chips", apple));
      expect(asSnack.category).toBe("healthy");
      expect(asSnack.rationale).toContain("Also met the junk food criteria");
    });

    it("falls back to the closest match when no threshold is crossed", () => {
      const result = service.classify(food("Water", { calories: 0 }));
      expect(result.category).toBe("healthy");
      expect(result.confidence).toBe(0.5);
      expect(result.rationale).toBe(
        "No category threshold was crossed; closest match is healthy (nutrient density 0.5, processing level 1, 0 preservatives).",
      );
      expect(result.notices).toHaveLength(1);
      expect(result.notices[0].kind).toBe("processing");
    });

    it("is deterministic down to the rationale text", () => {
      for (const item of [broccoli, saltySnack, food("Water", { calories: 0 })]) {
        expect(service.classify(item)).toEqual(service.classify(item));
      }
    });

    it("always returns one of the fixed categories", () => {
      const items = [
        broccoli,
        saltySnack,
        food("Soda", { calories: 140, sugar: 39, processingLevel: 4 }),
        food("Bread", { calories: 265, protein: 9, fiber: 2.7, sodium: 490, processingLevel: 3 }),
        food("Rice", { calories: 130, protein: 2.7, fiber: 0.4, processingLevel: 2 }),
      ];
      for (const item of items) {
        const result = service.classify(item);
        expect(FOOD_CATEGORIES).toContain(result.category);
        expect(result.confidence).toBeGreaterThanOrEqual(0);
        expect(result.confidence).toBeLessThanOrEqual(1);
      }
    });
  });
});
