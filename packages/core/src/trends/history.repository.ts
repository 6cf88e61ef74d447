import type { MetricPoint, TimeRange, TrendMetric } from "@habitlens/shared";

export const HISTORY_REPOSITORY = Symbol("HISTORY_REPOSITORY");

/** Read-only feed of past metric values, oldest first. */
export interface HistoryRepository {
  fetch(userId: string, metric: TrendMetric, timeRange: TimeRange): Promise<MetricPoint[]>;
}
