import { TREND_METRICS } from "@habitlens/shared";
import type {
  HabitType,
  LifestyleRecord,
  MetricPoint,
  MetricSeries,
  TrendMetric,
} from "@habitlens/shared";

/** Null on days with no food logged, so they are not read as fasting. */
function sumFood(record: LifestyleRecord, key: "calories" | "sodium" | "sugar"): number | null {
  if (record.foodItems.length === 0) return null;
  return record.foodItems.reduce((sum, item) => sum + item.nutrition[key], 0);
}

function habitIntensity(record: LifestyleRecord, type: HabitType): number {
  return record.habits.filter((h) => h.type === type).reduce((sum, h) => sum + h.intensity, 0);
}

function habitHours(record: LifestyleRecord, type: HabitType): number {
  return record.habits
    .filter((h) => h.type === type)
    .reduce((sum, h) => sum + (h.duration ?? 0), 0);
}

export const TREND_METRIC_CONFIG: Record<
  TrendMetric,
  { label: string; extract: (record: LifestyleRecord) => number | null }
> = {
  water_intake: { label: "water intake", extract: (r) => r.waterIntake },
  sleep_quality: { label: "sleep quality", extract: (r) => r.sleep?.quality ?? null },
  sleep_duration: { label: "sleep duration", extract: (r) => r.sleep?.duration ?? null },
  calories: { label: "calories", extract: (r) => sumFood(r, "calories") },
  sodium: { label: "sodium", extract: (r) => sumFood(r, "sodium") },
  sugar: { label: "sugar", extract: (r) => sumFood(r, "sugar") },
  caffeine: { label: "caffeine", extract: (r) => habitIntensity(r, "caffeine") },
  stress: {
    label: "stress",
    extract: (r) => Math.max(0, ...r.habits.filter((h) => h.type === "stress").map((h) => h.intensity)),
  },
  exercise_minutes: { label: "exercise minutes", extract: (r) => habitHours(r, "exercise") * 60 },
  screen_time: { label: "screen time", extract: (r) => habitHours(r, "screen_time") },
};

/** Metrics a person acts on directly; the rest are sleep outcomes. */
export const HABIT_METRICS: readonly TrendMetric[] = [
  "water_intake",
  "calories",
  "sodium",
  "sugar",
  "caffeine",
  "stress",
  "exercise_minutes",
  "screen_time",
];

/** Habit/outcome pairs checked for association on every trend run. */
export const CORRELATION_PAIRS: ReadonlyArray<readonly [TrendMetric, TrendMetric]> = [
  ["caffeine", "sleep_quality"],
  ["stress", "sleep_quality"],
  ["screen_time", "sleep_quality"],
  ["exercise_minutes", "sleep_quality"],
  ["water_intake", "sleep_quality"],
  ["sugar", "sleep_quality"],
  ["calories", "sleep_duration"],
  ["stress", "sleep_duration"],
];

export function metricLabel(metric: TrendMetric): string {
  return TREND_METRIC_CONFIG[metric].label;
}

/** History in timestamp order, optionally clipped to a range. Never mutates the input. */
export function orderedHistory(
  history: readonly LifestyleRecord[],
  range?: { start: string; end: string },
): LifestyleRecord[] {
  const start = range ? Date.parse(range.start) : -Infinity;
  const end = range ? Date.parse(range.end) : Infinity;
  return history
    .filter((r) => {
      const at = Date.parse(r.timestamp);
      return at >= start && at <= end;
    })
    .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}

export function metricPoints(history: readonly LifestyleRecord[], metric: TrendMetric): MetricPoint[] {
  const { extract } = TREND_METRIC_CONFIG[metric];
  const points: MetricPoint[] = [];
  for (const record of history) {
    const value = extract(record);
    if (value !== null) points.push({ timestamp: record.timestamp, value });
  }
  return points;
}

/** Metrics that were never non-zero (habits nobody logged) are left out. */
export function seriesFromHistory(history: readonly LifestyleRecord[]): MetricSeries {
  const series: MetricSeries = {};
  for (const metric of TREND_METRICS) {
    const points = metricPoints(history, metric);
    if (points.some((p) => p.value !== 0)) series[metric] = points;
  }
  return series;
}
