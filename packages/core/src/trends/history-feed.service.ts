import { Inject, Injectable, Logger } from "@nestjs/common";
import { TREND_METRICS } from "@habitlens/shared";
import type { MetricPoint, MetricSeries, TimeRange, TrendMetric } from "@habitlens/shared";
import { TimeoutError, firstValueFrom, from, timeout } from "rxjs";
import { SystemError } from "../common/errors";
import { PIPELINE_CONFIG } from "../config/pipeline.config";
import type { PipelineConfig } from "../config/pipeline.config";
import { HISTORY_REPOSITORY } from "./history.repository";
import type { HistoryRepository } from "./history.repository";

/**
 * Reads metric history through the injected repository with a bounded wait.
 * Any failure reaches the caller as a generic SystemError; the cause is only logged.
 */
@Injectable()
export class HistoryFeedService {
  private readonly logger = new Logger(HistoryFeedService.name);

  constructor(
    @Inject(HISTORY_REPOSITORY) private readonly repository: HistoryRepository,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async fetchSeries(userId: string, timeRange: TimeRange): Promise<MetricSeries> {
    const fetched = await Promise.all(
      TREND_METRICS.map(async (metric) => ({
        metric,
        points: await this.fetchMetric(userId, metric, timeRange),
      })),
    );
    const series: MetricSeries = {};
    for (const { metric, points } of fetched) {
      if (points.length > 0) series[metric] = points;
    }
    return series;
  }

  private async fetchMetric(
    userId: string,
    metric: TrendMetric,
    timeRange: TimeRange,
  ): Promise<MetricPoint[]> {
    const limit = this.config.historyTimeoutMs;
    try {
      return await firstValueFrom(
        from(this.repository.fetch(userId, metric, timeRange)).pipe(timeout(limit)),
      );
    } catch (err) {
      const detail =
        err instanceof TimeoutError
          ? `no response within ${limit}ms`
          : err instanceof Error
            ? (err.stack ?? err.message)
            : String(err);
      this.logger.error(`History fetch failed for user ${userId}, metric ${metric}: ${detail}`);
      throw new SystemError();
    }
  }
}
