import { Injectable, Logger } from "@nestjs/common";
import { PRIORITIES, sleepDataSchema } from "@habitlens/shared";
import type {
  LifestyleRecord,
  SleepAnalysis,
  SleepCorrelation,
  SleepData,
  SleepDisruptor,
  SleepQualityBand,
  SleepRecommendation,
} from "@habitlens/shared";
import { ValidationError } from "../common/errors";
import { clamp, formatNumber, hoursUntil, round } from "../common/numbers";

export const SLEEP_WINDOWS = {
  caffeineHours: 6,
  lateEatingHours: 3,
  screenHours: 2,
  exerciseHours: 3,
  lowWaterMl: 1500,
  suboptimalWaterMl: 2000,
  highWaterMl: 4500,
  highStress: 7,
  moderateStress: 5,
  scheduleQuality: 5,
} as const;

interface Finding {
  correlation: SleepCorrelation;
  /** Present on every negative finding */
  disruptor?: SleepDisruptor;
  recommendation?: SleepRecommendation;
}

const WIND_DOWN: Pick<SleepCorrelation, "habit" | "outcome"> = {
  habit: "A calm wind-down routine",
  outcome: "steadier sleep onset",
};

const SCHEDULE_RECOMMENDATION: SleepRecommendation = {
  priority: "medium",
  action: "Keep a consistent sleep schedule",
  rationale:
    "Going to bed and waking at the same times each day steadies your body clock, which lifts sleep quality over time.",
  expectedImpact: "More predictable, better-rated nights",
};

export function bandSleepQuality(quality: number): SleepQualityBand {
  if (quality <= 3) return "poor";
  if (quality <= 6) return "fair";
  if (quality <= 8) return "good";
  return "excellent";
}

/** Closest habit of `type` timed within `windowHours` before bed. */
function closestBefore(
  record: LifestyleRecord,
  type: "caffeine" | "screen_time",
  bedtime: string,
  windowHours: number,
): { time: string; gap: number } | null {
  let closest: { time: string; gap: number } | null = null;
  for (const habit of record.habits) {
    if (habit.type !== type || !habit.timing) continue;
    const gap = hoursUntil(habit.timing, bedtime);
    if (gap <= windowHours && (!closest || gap < closest.gap)) {
      closest = { time: habit.timing, gap };
    }
  }
  return closest;
}

function caffeineFinding(record: LifestyleRecord, bedtime: string | null): Finding | null {
  if (!record.habits.some((h) => h.type === "caffeine")) return null;
  const late = bedtime ? closestBefore(record, "caffeine", bedtime, SLEEP_WINDOWS.caffeineHours) : null;
  if (!late) {
    return {
      correlation: {
        habit: "Caffeine earlier in the day",
        outcome: "undisturbed sleep onset",
        impact: "neutral",
        strength: 2,
      },
    };
  }
  const strength = clamp(Math.floor(10 - late.gap), 1, 10);
  return {
    correlation: {
      habit: `Caffeine ${formatNumber(late.gap)} hours before bed`,
      outcome: "delayed sleep onset and lighter sleep",
      impact: "negative",
      strength,
    },
    disruptor: {
      type: "caffeine",
      severity: strength,
      timing: `${late.time} (${formatNumber(late.gap)}h before bed)`,
      recommendation:
        "Switch to decaffeinated drinks or herbal tea in the afternoon and evening.",
    },
    recommendation: {
      priority: "high",
      action: "Avoid caffeine in the 6 hours before bed",
      rationale: "Caffeine stays active for 5 to 6 hours and keeps the brain alert when it should be winding down.",
      expectedImpact: "Falling asleep sooner and sleeping more deeply",
    },
  };
}

function lateEatingFinding(record: LifestyleRecord, bedtime: string | null): Finding | null {
  if (!bedtime) return null;
  let latest: { time: string; gap: number } | null = null;
  for (const item of record.foodItems) {
    if (!item.consumedAt) continue;
    const gap = hoursUntil(item.consumedAt, bedtime);
    if (gap < SLEEP_WINDOWS.lateEatingHours && (!latest || gap < latest.gap)) {
      latest = { time: item.consumedAt, gap };
    }
  }
  if (!latest) return null;
  const strength = clamp(Math.floor(8 - 2 * latest.gap), 1, 10);
  return {
    correlation: {
      habit: `Eating ${formatNumber(latest.gap)} hours before bed`,
      outcome: "restless sleep while digestion is still active",
      impact: "negative",
      strength,
    },
    disruptor: {
      type: "late_eating",
      severity: strength,
      timing: `${latest.time} (${formatNumber(latest.gap)}h before bed)`,
      recommendation: "If you need an evening snack, keep it light and easy to digest.",
    },
    recommendation: {
      priority: "high",
      action: "Finish eating at least 3 hours before bedtime",
      rationale: "A late meal keeps digestion busy while the body is trying to wind down.",
      expectedImpact: "Less night-time discomfort and better-rated sleep",
    },
  };
}

function hydrationFinding(record: LifestyleRecord): Finding | null {
  const water = record.waterIntake;
  const w = SLEEP_WINDOWS;
  if (water < w.lowWaterMl) {
    return {
      correlation: {
        habit: `Low water intake (${formatNumber(water)}ml)`,
        outcome: "night-time discomfort and restlessness",
        impact: "negative",
        strength: 6,
      },
      disruptor: {
        type: "dehydration",
        severity: 6,
        timing: `Daily intake: ${formatNumber(water)}ml`,
        recommendation: "Drink most of your water earlier in the day to avoid bathroom trips at night.",
      },
      recommendation: {
        priority: "medium",
        action: "Raise daily water intake to 2000-3000ml",
        rationale: "Being short on fluids can leave you uncomfortable and restless at night.",
        expectedImpact: "Fewer night-time awakenings",
      },
    };
  }
  if (water > w.highWaterMl) {
    return {
      correlation: {
        habit: `Very high water intake (${formatNumber(water)}ml)`,
        outcome: "waking at night to use the bathroom",
        impact: "negative",
        strength: 4,
      },
      disruptor: {
        type: "overhydration",
        severity: 4,
        timing: `Daily intake: ${formatNumber(water)}ml`,
        recommendation: "Taper drinks in the two hours before bed.",
      },
      recommendation: {
        priority: "low",
        action: "Front-load your water earlier in the day",
        rationale: "Large volumes late in the day often mean interrupted nights.",
        expectedImpact: "Fewer interruptions",
      },
    };
  }
  if (water < w.suboptimalWaterMl) {
    return {
      correlation: {
        habit: `Slightly low water intake (${formatNumber(water)}ml)`,
        outcome: "sleep comfort",
        impact: "neutral",
        strength: 3,
      },
    };
  }
  return null;
}

function stressFinding(record: LifestyleRecord): Finding | null {
  const intensities = record.habits.filter((h) => h.type === "stress").map((h) => h.intensity);
  if (intensities.length === 0) return null;
  const peak = Math.max(...intensities);
  if (peak < SLEEP_WINDOWS.moderateStress) return null;
  const high = peak >= SLEEP_WINDOWS.highStress;
  const strength = high ? 9 : 6;
  return {
    correlation: {
      habit: `${high ? "High" : "Moderate"} stress (intensity ${peak}/10)`,
      outcome: "less deep, restorative sleep",
      impact: "negative",
      strength,
    },
    disruptor: {
      type: "stress",
      severity: strength,
      timing: `Stress intensity: ${peak}/10`,
      recommendation: high
        ? "Try journaling, breathing exercises or a short meditation as part of a relaxing bedtime routine."
        : "Light exercise, mindfulness or a relaxing hobby in the evening can help you unwind.",
    },
    recommendation: {
      priority: "high",
      action: "Practise a relaxation technique before bed",
      rationale: "Stress keeps the body on alert; slow breathing or gentle stretching helps it switch into rest.",
      expectedImpact: "Easier sleep onset and more restorative sleep",
    },
  };
}

function screenFinding(record: LifestyleRecord, bedtime: string | null): Finding | null {
  if (!bedtime) return null;
  const late = closestBefore(record, "screen_time", bedtime, SLEEP_WINDOWS.screenHours);
  if (!late) return null;
  const strength = clamp(Math.floor(8 - 2 * late.gap), 1, 10);
  return {
    correlation: {
      habit: `Screen time ${formatNumber(late.gap)} hours before bed`,
      outcome: "delayed sleep onset as evening light holds back melatonin",
      impact: "negative",
      strength,
    },
    disruptor: {
      type: "screen_time",
      severity: strength,
      timing: `${late.time} (${formatNumber(late.gap)}h before bed)`,
      recommendation: "Use night mode or swap the screen for a book in the last hour.",
    },
    recommendation: {
      priority: "medium",
      action: "Put screens away 1-2 hours before bedtime",
      rationale: "Bright screen light suppresses melatonin, the hormone that signals it is time to sleep.",
      expectedImpact: "Falling asleep sooner",
    },
  };
}

function exerciseFinding(record: LifestyleRecord, bedtime: string | null): Finding | null {
  const sessions = record.habits.filter((h) => h.type === "exercise");
  if (sessions.length === 0) return null;
  const gaps = bedtime
    ? sessions.flatMap((h) => (h.timing ? [hoursUntil(h.timing, bedtime)] : []))
    : [];
  if (gaps.length > 0 && Math.min(...gaps) < SLEEP_WINDOWS.exerciseHours) {
    return {
      correlation: {
        habit: "Exercise close to bedtime",
        outcome: "a slower wind-down",
        impact: "neutral",
        strength: 3,
      },
    };
  }
  return {
    correlation: {
      habit: "Exercise earlier in the day",
      outcome: "deeper sleep",
      impact: "positive",
      strength: 5,
    },
  };
}

function collectFindings(record: LifestyleRecord, bedtime: string | null): Finding[] {
  return [
    caffeineFinding(record, bedtime),
    lateEatingFinding(record, bedtime),
    hydrationFinding(record),
    stressFinding(record),
    screenFinding(record, bedtime),
    exerciseFinding(record, bedtime),
  ].filter((f): f is Finding => f !== null);
}

function disruptorsOf(findings: readonly Finding[]): SleepDisruptor[] {
  return findings
    .flatMap((f) => (f.disruptor ? [f.disruptor] : []))
    .sort((a, b) => b.severity - a.severity);
}

@Injectable()
export class SleepAnalyzerService {
  private readonly logger = new Logger(SleepAnalyzerService.name);

  analyze(sleepData: Partial<SleepData> | undefined, record: LifestyleRecord): SleepAnalysis {
    const sleep = this.requireSleepData(sleepData);
    const findings = collectFindings(record, sleep.bedtime);
    const correlations = findings.map((f) => f.correlation);
    const negatives = findings
      .filter((f) => f.correlation.impact === "negative")
      .sort((a, b) => b.correlation.strength - a.correlation.strength);

    const recommendations: SleepRecommendation[] = [];
    for (const finding of negatives) {
      if (finding.recommendation && !recommendations.some((r) => r.action === finding.recommendation?.action)) {
        recommendations.push(finding.recommendation);
      }
    }
    if (sleep.quality <= SLEEP_WINDOWS.scheduleQuality) {
      recommendations.push(SCHEDULE_RECOMMENDATION);
    }
    recommendations.sort((a, b) => PRIORITIES.indexOf(a.priority) - PRIORITIES.indexOf(b.priority));

    const overallQuality = bandSleepQuality(sleep.quality);
    this.logger.debug(
      `Sleep for ${record.userId}: ${overallQuality}, ${negatives.length} negative correlation(s)`,
    );

    return {
      overallQuality,
      correlations,
      disruptors: disruptorsOf(findings),
      recommendations,
      explanation: this.explain(sleep, overallQuality, correlations),
      confidence: round(Math.min(0.9, 0.6 + 0.05 * correlations.length), 2),
    };
  }

  /** Sleep disruptors for the day, strongest first. Timing checks need a logged bedtime. */
  identifyDisruptors(record: LifestyleRecord): SleepDisruptor[] {
    return disruptorsOf(collectFindings(record, record.sleep?.bedtime ?? null));
  }

  private requireSleepData(sleepData: Partial<SleepData> | undefined): SleepData {
    if (!sleepData) {
      throw new ValidationError("sleep", "Sleep data is required for sleep analysis.");
    }
    for (const field of ["duration", "quality"] as const) {
      if (sleepData[field] === undefined) {
        throw new ValidationError(`sleep.${field}`, `Sleep ${field} is required for sleep analysis.`);
      }
    }
    const parsed = sleepDataSchema.safeParse(sleepData);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(`sleep.${issue.path.join(".")}`, issue.message);
    }
    return parsed.data;
  }

  private explain(
    sleep: SleepData,
    band: SleepQualityBand,
    correlations: readonly SleepCorrelation[],
  ): string {
    const parts = [
      `Your sleep was ${band}: ${formatNumber(sleep.duration)} hours, rated ${sleep.quality}/10.`,
    ];
    if (sleep.interruptions > 0) {
      parts.push(
        `You woke ${sleep.interruptions} ${sleep.interruptions === 1 ? "time" : "times"} during the night.`,
      );
    }

    const byStrength = (impact: SleepCorrelation["impact"]) =>
      correlations.filter((c) => c.impact === impact).sort((a, b) => b.strength - a.strength);
    const negatives = byStrength("negative");
    const paired = negatives.length > 0 ? negatives : byStrength("positive");

    for (const c of paired.length > 0 ? paired : [WIND_DOWN]) {
      parts.push(`${c.habit} is associated with ${c.outcome}.`);
    }
    if (negatives.length === 0) {
      parts.push("No logged habit stood out as working against your sleep.");
    }
    return parts.join(" ");
  }
}
