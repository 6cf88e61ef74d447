export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Up to two decimals, trailing zeros dropped: 22.5, 0.85, 900. */
export function formatNumber(value: number): string {
  return String(round(value, 2));
}

/** "HH:MM" to minutes after midnight. */
export function minutesOfDay(time: string): number {
  const [hours, minutes] = time.split(":").map(Number);
  return hours * 60 + minutes;
}

/** Hours from `from` forward to `to`, wrapping past midnight. */
export function hoursUntil(from: string, to: string): number {
  const diff = minutesOfDay(to) - minutesOfDay(from);
  return ((diff + 24 * 60) % (24 * 60)) / 60;
}
