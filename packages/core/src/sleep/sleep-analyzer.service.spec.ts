import { ValidationError } from "../common/errors";
import { buildFood, buildHabit, buildRecord, buildSleep } from "../testing/lifestyle.fixtures";
import { SleepAnalyzerService, bandSleepQuality } from "./sleep-analyzer.service";

describe("SleepAnalyzerService", () => {
  let service: SleepAnalyzerService;

  beforeEach(() => {
    service = new SleepAnalyzerService();
  });

  it("bands quality scores", () => {
    expect([1, 3, 4, 6, 7, 8, 9, 10].map(bandSleepQuality)).toEqual([
      "poor",
      "poor",
      "fair",
      "fair",
      "good",
      "good",
      "excellent",
      "excellent",
    ]);
  });

  describe("analyze", () => {
    it("explains an uneventful night with a wind-down pairing", () => {
      const result = service.analyze(buildSleep(), buildRecord());

      expect(result.overallQuality).toBe("good");
      expect(result.correlations).toEqual([]);
      expect(result.disruptors).toEqual([]);
      expect(result.recommendations).toEqual([]);
      expect(result.confidence).toBe(0.6);
      expect(result.explanation).toBe(
        "Your sleep was good: 7.5 hours, rated 7/10. You woke 1 time during the night. " +
          "A calm wind-down routine is associated with steadier sleep onset. " +
          "No logged habit stood out as working against your sleep.",
      );
    });

    it("flags caffeine within six hours of bed", () => {
      const record = buildRecord({ habits: [buildHabit("caffeine", 5, { timing: "18:00" })] });
      const result = service.analyze(buildSleep(), record);

      expect(result.correlations).toEqual([
        {
          habit: "Caffeine 5 hours before bed",
          outcome: "delayed sleep onset and lighter sleep",
          impact: "negative",
          strength: 5,
        },
      ]);
      expect(result.disruptors).toEqual([
        expect.objectContaining({ type: "caffeine", severity: 5, timing: "18:00 (5h before bed)" }),
      ]);
      expect(result.recommendations.map((r) => r.action)).toEqual([
        "Avoid caffeine in the 6 hours before bed",
      ]);
      expect(result.confidence).toBe(0.65);
    });

    it("treats morning caffeine as neutral", () => {
      const record = buildRecord({ habits: [buildHabit("caffeine", 5, { timing: "09:00" })] });
      const result = service.analyze(buildSleep(), record);

      expect(result.correlations).toEqual([
        expect.objectContaining({ impact: "neutral", strength: 2 }),
      ]);
      expect(result.disruptors).toEqual([]);
    });

    it("detects late eating from the latest timed food", () => {
      const record = buildRecord({
        foodItems: [
          buildFood("Lunch", {}, { consumedAt: "12:30" }),
          buildFood("Pasta", {}, { consumedAt: "21:30" }),
          buildFood("Apple"),
        ],
      });
      const result = service.analyze(buildSleep(), record);

      expect(result.correlations).toEqual([
        expect.objectContaining({ habit: "Eating 1.5 hours before bed", impact: "negative", strength: 5 }),
      ]);
      expect(result.disruptors[0].type).toBe("late_eating");
    });

    it("separates dehydration from overhydration", () => {
      const low = service.analyze(buildSleep(), buildRecord({ waterIntake: 1000 }));
      const high = service.analyze(buildSleep(), buildRecord({ waterIntake: 5000 }));
      const slight = service.analyze(buildSleep(), buildRecord({ waterIntake: 1800 }));

      expect(low.disruptors.map((d) => [d.type, d.severity])).toEqual([["dehydration", 6]]);
      expect(high.disruptors.map((d) => [d.type, d.severity])).toEqual([["overhydration", 4]]);
      expect(slight.disruptors).toEqual([]);
      expect(slight.correlations[0]).toEqual(expect.objectContaining({ impact: "neutral", strength: 3 }));
    });

    it("counts exercise well before bed as positive", () => {
      const early = service.analyze(
        buildSleep(),
        buildRecord({ habits: [buildHabit("exercise", 6, { timing: "07:00" })] }),
      );
      const late = service.analyze(
        buildSleep(),
        buildRecord({ habits: [buildHabit("exercise", 6, { timing: "21:30" })] }),
      );

      expect(early.correlations[0].impact).toBe("positive");
      expect(early.explanation).toContain("Exercise earlier in the day is associated with deeper sleep.");
      expect(late.correlations[0]).toEqual(expect.objectContaining({ impact: "neutral", strength: 3 }));
    });

    it("orders disruptors by severity and recommendations by priority", () => {
      const record = buildRecord({
        foodItems: [buildFood("Pasta", {}, { consumedAt: "21:30" })],
        waterIntake: 1000,
        habits: [
          buildHabit("caffeine", 5, { timing: "18:00" }),
          buildHabit("stress", 8),
          buildHabit("screen_time", 4, { timing: "22:30" }),
          buildHabit("exercise", 6, { timing: "07:00" }),
        ],
      });
      const result = service.analyze(buildSleep({ quality: 3 }), record);

      expect(result.overallQuality).toBe("poor");
      expect(result.disruptors.map((d) => d.type)).toEqual([
        "stress",
        "screen_time",
        "dehydration",
        "caffeine",
        "late_eating",
      ]);
      expect(result.recommendations.map((r) => r.action)).toEqual([
        "Practise a relaxation technique before bed",
        "Avoid caffeine in the 6 hours before bed",
        "Finish eating at least 3 hours before bedtime",
        "Put screens away 1-2 hours before bedtime",
        "Raise daily water intake to 2000-3000ml",
        "Keep a consistent sleep schedule",
      ]);
      expect(result.confidence).toBe(0.9);
    });

    it("pairs every negative habit with its outcome in the explanation", () => {
      const record = buildRecord({
        waterIntake: 1000,
        habits: [buildHabit("stress", 6), buildHabit("screen_time", 4, { timing: "22:00" })],
      });
      const result = service.analyze(buildSleep(), record);
      const negatives = result.correlations.filter((c) => c.impact === "negative");

      expect(negatives).toHaveLength(3);
      for (const c of negatives) {
        expect(result.explanation).toContain(`${c.habit} is associated with ${c.outcome}.`);
        expect(result.disruptors.length).toBeGreaterThanOrEqual(negatives.length);
      }
      expect(result.recommendations.length).toBeGreaterThan(0);
    });

    it("rejects missing sleep data", () => {
      expect(() => service.analyze(undefined, buildRecord())).toThrow(ValidationError);
      expect(() => service.analyze({ quality: 5 }, buildRecord())).toThrow(
        expect.objectContaining({ field: "sleep.duration" }),
      );
      expect(() => service.analyze({ duration: 7 }, buildRecord())).toThrow(
        expect.objectContaining({ field: "sleep.quality" }),
      );
    });

    it("rejects out-of-range sleep values", () => {
      expect(() => service.analyze(buildSleep({ quality: 11 }), buildRecord())).toThrow(
        expect.objectContaining({ field: "sleep.quality" }),
      );
    });
  });

  describe("identifyDisruptors", () => {
    it("skips timing checks when no bedtime is logged", () => {
      const record = buildRecord({
        waterIntake: 1000,
        habits: [buildHabit("caffeine", 5, { timing: "18:00" })],
      });
      expect(service.identifyDisruptors(record).map((d) => d.type)).toEqual(["dehydration"]);
    });

    it("uses the record's own bedtime when present", () => {
      const record = buildRecord({
        sleep: buildSleep(),
        habits: [buildHabit("caffeine", 5, { timing: "18:00" })],
      });
      expect(service.identifyDisruptors(record).map((d) => d.type)).toEqual(["caffeine"]);
    });
  });
});
