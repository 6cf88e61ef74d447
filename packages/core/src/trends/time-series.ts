import { mean } from "../common/numbers";

/** Kendall's tau-a: +1 strictly rising, -1 strictly falling, tied pairs count as neither. */
export function kendallTau(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  let score = 0;
  for (let i = 0; i < n - 1; i++) {
    for (let j = i + 1; j < n; j++) {
      score += Math.sign(values[j] - values[i]);
    }
  }
  return score / ((n * (n - 1)) / 2);
}

/** Least-squares line against the entry index. */
export function linearFit(values: readonly number[]): { slope: number; rSquared: number } {
  const n = values.length;
  if (n < 2) return { slope: 0, rSquared: 0 };
  const xMean = (n - 1) / 2;
  const yMean = mean(values);
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  values.forEach((y, x) => {
    sxy += (x - xMean) * (y - yMean);
    sxx += (x - xMean) ** 2;
    syy += (y - yMean) ** 2;
  });
  const slope = sxy / sxx;
  return { slope, rSquared: syy === 0 ? 0 : (sxy * sxy) / (sxx * syy) };
}

export function pearson(xs: readonly number[], ys: readonly number[]): number {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return 0;
  const xMean = mean(xs.slice(0, n));
  const yMean = mean(ys.slice(0, n));
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    sxy += (xs[i] - xMean) * (ys[i] - yMean);
    sxx += (xs[i] - xMean) ** 2;
    syy += (ys[i] - yMean) ** 2;
  }
  if (sxx === 0 || syy === 0) return 0;
  return sxy / Math.sqrt(sxx * syy);
}

export function autocorrelation(values: readonly number[], lag: number): number {
  const m = mean(values);
  let denominator = 0;
  for (const v of values) denominator += (v - m) ** 2;
  if (denominator === 0 || lag >= values.length) return 0;
  let numerator = 0;
  for (let i = 0; i + lag < values.length; i++) {
    numerator += (values[i] - m) * (values[i + lag] - m);
  }
  return numerator / denominator;
}

export const MIN_PERIOD_CORRELATION = 0.5;

/**
 * Strongest repeating period of at least 2 entries. A period is only
 * considered when the series holds two full repetitions of it.
 */
export function detectPeriod(values: readonly number[]): { period: number; strength: number } | null {
  let best: { period: number; strength: number } | null = null;
  for (let lag = 2; lag * 2 <= values.length; lag++) {
    const strength = autocorrelation(values, lag);
    if (strength >= MIN_PERIOD_CORRELATION && (!best || strength > best.strength)) {
      best = { period: lag, strength };
    }
  }
  return best;
}

export function coefficientOfVariation(values: readonly number[]): number {
  const m = mean(values);
  if (m === 0) return 0;
  const variance = mean(values.map((v) => (v - m) ** 2));
  return Math.sqrt(variance) / Math.abs(m);
}
