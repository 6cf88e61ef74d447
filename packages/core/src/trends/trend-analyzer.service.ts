import { Injectable, Logger } from "@nestjs/common";
import { TREND_METRICS } from "@habitlens/shared";
import type {
  CausalityLevel,
  ChartSeries,
  LifestyleRecord,
  MetricPoint,
  MetricSeries,
  PipelineIssue,
  TimeRange,
  TrendAnalysis,
  TrendChange,
  TrendCorrelation,
  TrendMetric,
  TrendPattern,
} from "@habitlens/shared";
import { ProcessingError } from "../common/errors";
import { clamp, formatNumber, mean, round } from "../common/numbers";
import {
  CORRELATION_PAIRS,
  HABIT_METRICS,
  metricLabel,
  metricPoints,
  orderedHistory,
  seriesFromHistory,
} from "./metrics";
import {
  coefficientOfVariation,
  detectPeriod,
  kendallTau,
  linearFit,
  pearson,
} from "./time-series";

export const TREND_LIMITS = {
  minPatternPoints: 7,
  patternWindow: 28,
  monotonicTau: 0.5,
  minCorrelationPairs: 7,
  reportedCorrelation: 0.3,
  changeBaselinePoints: 7,
  minBaselinePoints: 3,
  changePercent: 30,
} as const;

// Up to two days either way; smaller lags are tried first and win ties
const LAG_ORDER = [0, 1, -1, 2, -2];

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function dayKey(timestamp: string): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/** Pairs values logged on the same calendar day (UTC), in day order. Later entries win. */
function alignByDay(a: readonly MetricPoint[], b: readonly MetricPoint[]): [number[], number[]] {
  const byDay = new Map<string, number>();
  for (const p of b) byDay.set(dayKey(p.timestamp), p.value);
  const left = new Map<string, number>();
  for (const p of a) left.set(dayKey(p.timestamp), p.value);

  const xs: number[] = [];
  const ys: number[] = [];
  for (const day of [...left.keys()].sort()) {
    const y = byDay.get(day);
    const x = left.get(day);
    if (x !== undefined && y !== undefined) {
      xs.push(x);
      ys.push(y);
    }
  }
  return [xs, ys];
}

function shift(xs: readonly number[], ys: readonly number[], lag: number): [number[], number[]] {
  return lag >= 0
    ? [xs.slice(0, xs.length - lag), ys.slice(lag)]
    : [xs.slice(-lag), ys.slice(0, ys.length + lag)];
}

/** Share of sliding windows whose correlation has the same sign as the overall one. */
export function signConsistency(xs: readonly number[], ys: readonly number[], overall: number): number {
  if (overall === 0) return 0;
  const size = Math.max(5, Math.floor(xs.length / 2));
  if (xs.length < size) return 0;
  let agreeing = 0;
  let windows = 0;
  for (let start = 0; start + size <= xs.length; start++) {
    const r = pearson(xs.slice(start, start + size), ys.slice(start, start + size));
    if (Math.sign(r) === Math.sign(overall)) agreeing++;
    windows++;
  }
  return agreeing / windows;
}

export function classifyCausality(strength: number, consistency: number): CausalityLevel {
  const magnitude = Math.abs(strength);
  if (magnitude >= 0.7 && consistency >= 0.8) return "likely";
  if (magnitude >= 0.4 && consistency >= 0.6) return "possible";
  return "unlikely";
}

export function correlateSeries(
  metricA: TrendMetric,
  metricB: TrendMetric,
  a: readonly MetricPoint[],
  b: readonly MetricPoint[],
): TrendCorrelation {
  const [xs, ys] = alignByDay(a, b);
  const labelA = metricLabel(metricA);
  const labelB = metricLabel(metricB);

  let best: { r: number; lag: number; xs: number[]; ys: number[] } | null = null;
  for (const lag of LAG_ORDER) {
    const [sx, sy] = shift(xs, ys, lag);
    if (sx.length < TREND_LIMITS.minCorrelationPairs) continue;
    const r = pearson(sx, sy);
    if (!best || Math.abs(r) > Math.abs(best.r)) best = { r, lag, xs: sx, ys: sy };
  }

  if (!best) {
    return {
      metricA,
      metricB,
      strength: 0,
      lag: 0,
      sampleSize: xs.length,
      signConsistency: 0,
      causality: "unlikely",
      description: `Not enough days with both ${labelA} and ${labelB} logged to compare them.`,
    };
  }

  const strength = round(best.r, 2);
  const consistency = round(signConsistency(best.xs, best.ys, best.r), 2);
  const causality = classifyCausality(strength, consistency);
  let description =
    strength === 0
      ? `${capitalize(labelA)} and ${labelB} showed no association`
      : `${capitalize(labelA)} and ${labelB} moved ${strength > 0 ? "together" : "in opposite directions"} (r = ${formatNumber(strength)})`;
  if (best.lag > 0) description += `, with ${labelB} following ${best.lag} day(s) later`;
  if (best.lag < 0) description += `, with ${labelA} following ${-best.lag} day(s) later`;

  return {
    metricA,
    metricB,
    strength,
    lag: best.lag,
    sampleSize: best.xs.length,
    signConsistency: consistency,
    causality,
    description: `${description}. Causal link: ${causality}.`,
  };
}

export function detectPattern(metric: TrendMetric, points: readonly MetricPoint[]): TrendPattern | null {
  if (points.length < TREND_LIMITS.minPatternPoints) return null;
  const window = points.slice(-TREND_LIMITS.patternWindow);
  const values = window.map((p) => p.value);
  const label = metricLabel(metric);
  const base = {
    metric,
    sampleSize: window.length,
    timeRange: { start: window[0].timestamp, end: window[window.length - 1].timestamp },
  };

  const tau = kendallTau(values);
  if (Math.abs(tau) >= TREND_LIMITS.monotonicTau) {
    const { slope, rSquared } = linearFit(values);
    return {
      ...base,
      trend: tau > 0 ? "increasing" : "decreasing",
      confidence: round(Math.abs(tau) * (0.9 + 0.1 * rSquared), 2),
      description: `${capitalize(label)} ${tau > 0 ? "rose" : "fell"} over ${window.length} entries (about ${formatNumber(Math.abs(slope))} per entry).`,
    };
  }

  const cycle = detectPeriod(values);
  if (cycle) {
    return {
      ...base,
      trend: "cyclical",
      period: cycle.period,
      confidence: round(Math.min(0.95, cycle.strength), 2),
      description: `${capitalize(label)} repeats roughly every ${cycle.period} entries.`,
    };
  }

  return {
    ...base,
    trend: "stable",
    confidence: round(clamp(1 - coefficientOfVariation(values), 0.3, 0.95), 2),
    description: `${capitalize(label)} held steady around ${formatNumber(mean(values))}.`,
  };
}

function baselineBefore(points: readonly MetricPoint[], index: number): number[] {
  return points
    .slice(Math.max(0, index - TREND_LIMITS.changeBaselinePoints), index)
    .map((p) => p.value);
}

function coOccurringCauses(
  metric: TrendMetric,
  changePoint: string,
  series: MetricSeries,
): string[] {
  const day = dayKey(changePoint);
  const causes: string[] = [];
  for (const other of HABIT_METRICS) {
    if (other === metric) continue;
    const points = series[other] ?? [];
    const index = points.findIndex((p) => dayKey(p.timestamp) === day);
    if (index < 1) continue;
    const baseline = mean(baselineBefore(points, index));
    const value = points[index].value;
    const moved =
      baseline === 0
        ? value !== 0
        : Math.abs((value - baseline) / baseline) * 100 > TREND_LIMITS.changePercent;
    if (moved) {
      causes.push(
        `${capitalize(metricLabel(other))} ${value > baseline ? "rose" : "fell"} from about ${formatNumber(baseline)} to ${formatNumber(value)}`,
      );
    }
  }
  return causes;
}

export function detectChange(
  metric: TrendMetric,
  points: readonly MetricPoint[],
  series: MetricSeries,
): TrendChange | null {
  const last = points.length - 1;
  const preceding = baselineBefore(points, last);
  if (last < 1 || preceding.length < TREND_LIMITS.minBaselinePoints) return null;
  const baseline = mean(preceding);
  if (baseline === 0) return null;

  const latest = points[last];
  const percentChange = ((latest.value - baseline) / baseline) * 100;
  if (Math.abs(percentChange) <= TREND_LIMITS.changePercent) return null;

  return {
    metric,
    changePoint: latest.timestamp,
    baseline: round(baseline, 2),
    value: latest.value,
    magnitude: round(Math.abs(latest.value - baseline), 2),
    percentChange: round(percentChange, 1),
    description:
      `${capitalize(metricLabel(metric))} was ${formatNumber(latest.value)} on ${dayKey(latest.timestamp)}, ` +
      `${percentChange > 0 ? "up" : "down"} ${formatNumber(Math.abs(round(percentChange, 1)))}% from its recent average of ${formatNumber(baseline)}.`,
    possibleCauses: coOccurringCauses(metric, latest.timestamp, series),
  };
}

@Injectable()
export class TrendAnalyzerService {
  private readonly logger = new Logger(TrendAnalyzerService.name);

  analyzeTrends(history: readonly LifestyleRecord[], timeRange: TimeRange): TrendAnalysis {
    return this.analyzeSeries(seriesFromHistory(orderedHistory(history, timeRange)), timeRange);
  }

  detectCorrelations(
    history: readonly LifestyleRecord[],
    metricA: TrendMetric,
    metricB: TrendMetric,
  ): TrendCorrelation {
    const ordered = orderedHistory(history);
    return correlateSeries(metricA, metricB, metricPoints(ordered, metricA), metricPoints(ordered, metricB));
  }

  /** Same analysis over series already fetched, e.g. from the history repository. */
  analyzeSeries(series: MetricSeries, timeRange: TimeRange): TrendAnalysis {
    const patterns: TrendPattern[] = [];
    const changes: TrendChange[] = [];
    const visualizations: ChartSeries[] = [];

    for (const metric of TREND_METRICS) {
      const points = series[metric];
      if (!points || points.length === 0) continue;
      visualizations.push({ metric, chartType: "line", points: [...points] });

      const pattern = detectPattern(metric, points);
      if (pattern) patterns.push(pattern);
      const change = detectChange(metric, points, series);
      if (change) changes.push(change);
    }

    const correlations: TrendCorrelation[] = [];
    for (const [metricA, metricB] of CORRELATION_PAIRS) {
      const a = series[metricA];
      const b = series[metricB];
      if (!a || !b) continue;
      const correlation = correlateSeries(metricA, metricB, a, b);
      if (Math.abs(correlation.strength) >= TREND_LIMITS.reportedCorrelation) {
        correlations.push(correlation);
      }
    }

    const notices: PipelineIssue[] = [];
    if (patterns.length === 0) {
      this.logger.warn(`Insufficient history for pattern detection (${visualizations.length} metric(s) tracked)`);
      notices.push(
        new ProcessingError(
          `At least ${TREND_LIMITS.minPatternPoints} entries of a metric are needed before trends can be detected.`,
          "Keep logging daily; trends appear after about a week of entries.",
        ).toIssue(),
      );
    }

    return {
      timeRange,
      patterns,
      correlations,
      changes,
      visualizations,
      notices,
      confidence: patterns.length > 0 ? round(mean(patterns.map((p) => p.confidence)), 2) : 0.3,
    };
  }
}
