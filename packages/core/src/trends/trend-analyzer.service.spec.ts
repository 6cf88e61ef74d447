import { buildHabit, buildHistory, buildSleep } from "../testing/lifestyle.fixtures";
import { TrendAnalyzerService, classifyCausality } from "./trend-analyzer.service";

const MARCH = {
  start: "2026-03-01T00:00:00.000Z",
  end: "2026-03-31T00:00:00.000Z",
};

describe("TrendAnalyzerService", () => {
  let service: TrendAnalyzerService;

  beforeEach(() => {
    service = new TrendAnalyzerService();
  });

  describe("analyzeTrends", () => {
    it("reports a strictly increasing metric with high confidence", () => {
      const history = buildHistory(10, (day) => ({ waterIntake: 1000 + 100 * day }));
      const result = service.analyzeTrends(history, MARCH);

      expect(result.patterns).toHaveLength(1);
      const [pattern] = result.patterns;
      expect(pattern.metric).toBe("water_intake");
      expect(pattern.trend).toBe("increasing");
      expect(pattern.confidence).toBeGreaterThan(0.8);
      expect(pattern.description).toBe("Water intake rose over 10 entries (about 100 per entry).");
      expect(pattern.timeRange).toEqual({
        start: "2026-03-01T08:00:00.000Z",
        end: "2026-03-10T08:00:00.000Z",
      });
      expect(result.visualizations.map((v) => v.metric)).toEqual(["water_intake"]);
      expect(result.notices).toEqual([]);
    });

    it("detects an alternating metric as cyclical", () => {
      const history = buildHistory(14, (day) => ({ waterIntake: day % 2 === 0 ? 1500 : 2500 }));
      const [pattern] = service.analyzeTrends(history, MARCH).patterns;

      expect(pattern.trend).toBe("cyclical");
      expect(pattern.period).toBe(2);
      expect(pattern.confidence).toBe(0.86);
    });

    it("calls a flat metric stable", () => {
      const history = buildHistory(8, () => ({ waterIntake: 2000 }));
      const [pattern] = service.analyzeTrends(history, MARCH).patterns;

      expect(pattern.trend).toBe("stable");
      expect(pattern.confidence).toBe(0.95);
      expect(pattern.description).toBe("Water intake held steady around 2000.");
    });

    it("returns no patterns and a notice with fewer than seven entries", () => {
      const history = buildHistory(5, (day) => ({ waterIntake: 1000 + 100 * day }));
      const result = service.analyzeTrends(history, MARCH);

      expect(result.patterns).toEqual([]);
      expect(result.notices).toEqual([expect.objectContaining({ kind: "processing" })]);
      expect(result.confidence).toBe(0.3);
    });

    it("flags a 40% jump over the baseline with co-occurring habit changes", () => {
      const history = buildHistory(7, (day) => ({
        waterIntake: day < 6 ? 100 : 140,
        habits: day === 6 ? [buildHabit("caffeine", 3)] : [],
      }));
      const { changes } = service.analyzeTrends(history, MARCH);

      expect(changes).toEqual([
        {
          metric: "water_intake",
          changePoint: "2026-03-07T08:00:00.000Z",
          baseline: 100,
          value: 140,
          magnitude: 40,
          percentChange: 40,
          description: "Water intake was 140 on 2026-03-07, up 40% from its recent average of 100.",
          possibleCauses: ["Caffeine rose from about 0 to 3"],
        },
      ]);
    });

    it("ignores records outside the time range and leaves the input untouched", () => {
      const history = buildHistory(10, (day) => ({ waterIntake: 1000 + 100 * day })).reverse();
      const before = history.map((r) => r.timestamp);
      const result = service.analyzeTrends(history, {
        start: "2026-03-05T00:00:00.000Z",
        end: "2026-03-31T00:00:00.000Z",
      });

      expect(result.visualizations[0].points).toHaveLength(6);
      expect(result.visualizations[0].points[0].value).toBe(1400);
      expect(result.patterns).toEqual([]);
      expect(history.map((r) => r.timestamp)).toEqual(before);
    });

    it("reports associations between fixed habit and outcome pairs", () => {
      const caffeine = [1, 5, 2, 8, 3, 9, 4, 7, 6, 10];
      const history = buildHistory(10, (day) => ({
        habits: [buildHabit("caffeine", caffeine[day])],
        sleep: buildSleep({ quality: 11 - caffeine[day] }),
      }));
      const { correlations } = service.analyzeTrends(history, MARCH);

      expect(correlations.map((c) => [c.metricA, c.metricB])).toEqual([["caffeine", "sleep_quality"]]);
    });
  });

  describe("detectCorrelations", () => {
    it("finds a consistent inverse association", () => {
      const caffeine = [1, 5, 2, 8, 3, 9, 4, 7, 6, 10];
      const history = buildHistory(10, (day) => ({
        habits: [buildHabit("caffeine", caffeine[day])],
        sleep: buildSleep({ quality: 11 - caffeine[day] }),
      }));
      const result = service.detectCorrelations(history, "caffeine", "sleep_quality");

      expect(result).toEqual({
        metricA: "caffeine",
        metricB: "sleep_quality",
        strength: -1,
        lag: 0,
        sampleSize: 10,
        signConsistency: 1,
        causality: "likely",
        description: "Caffeine and sleep quality moved in opposite directions (r = -1). Causal link: likely.",
      });
    });

    it("reports zero strength with too few shared days", () => {
      const history = buildHistory(5, (day) => ({
        habits: [buildHabit("caffeine", day + 1)],
        sleep: buildSleep({ quality: 10 - day }),
      }));
      const result = service.detectCorrelations(history, "caffeine", "sleep_quality");

      expect(result.strength).toBe(0);
      expect(result.causality).toBe("unlikely");
      expect(result.sampleSize).toBe(5);
    });
  });

  it("classifies causality from strength and sign consistency", () => {
    expect(classifyCausality(-0.8, 0.9)).toBe("likely");
    expect(classifyCausality(0.8, 0.7)).toBe("possible");
    expect(classifyCausality(0.5, 0.6)).toBe("possible");
    expect(classifyCausality(0.35, 1)).toBe("unlikely");
  });
});
