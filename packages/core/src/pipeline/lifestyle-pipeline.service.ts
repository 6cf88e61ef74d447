import { Inject, Injectable, Logger } from "@nestjs/common";
import { pipelineRequestDto } from "@habitlens/shared";
import type {
  AnalysisResult,
  BodyType,
  LifestyleRecord,
  PipelineIssue,
  PipelineReport,
  PipelineRequestDto,
  TimeRange,
  TrendAnalysis,
} from "@habitlens/shared";
import { BodyTypeAnalyzerService } from "../body-type/body-type-analyzer.service";
import { ValidationError, isPipelineError } from "../common/errors";
import { PIPELINE_CONFIG } from "../config/pipeline.config";
import type { PipelineConfig } from "../config/pipeline.config";
import { FoodClassifierService } from "../food/food-classifier.service";
import { EducationalContentService } from "../insights/educational-content.service";
import { InsightGeneratorService } from "../insights/insight-generator.service";
import { AuditLogService } from "../privacy/audit-log.service";
import { UserDataStoreService } from "../privacy/user-data-store.service";
import { SleepAnalyzerService } from "../sleep/sleep-analyzer.service";
import { HistoryFeedService } from "../trends/history-feed.service";
import { TrendAnalyzerService } from "../trends/trend-analyzer.service";
import { InputValidatorService } from "../validation/input-validator.service";
import { WaterRetentionService } from "../water/water-retention.service";

const DAY_MS = 24 * 60 * 60 * 1000;

// The record goes through the input validator, which also sanitises it
const requestOptionsSchema = pipelineRequestDto.omit({ record: true });

interface PreparedRun {
  record: LifestyleRecord;
  bodyType: BodyType;
  history: LifestyleRecord[] | undefined;
  timeRange: TimeRange;
}

/**
 * Runs every analyzer over one validated record, joins their results and turns
 * them into prioritised insights with educational content.
 */
@Injectable()
export class LifestylePipelineService {
  private readonly logger = new Logger(LifestylePipelineService.name);

  constructor(
    private readonly validator: InputValidatorService,
    private readonly food: FoodClassifierService,
    private readonly water: WaterRetentionService,
    private readonly sleep: SleepAnalyzerService,
    private readonly bodyType: BodyTypeAnalyzerService,
    private readonly trends: TrendAnalyzerService,
    private readonly historyFeed: HistoryFeedService,
    private readonly insights: InsightGeneratorService,
    private readonly content: EducationalContentService,
    private readonly store: UserDataStoreService,
    private readonly auditLog: AuditLogService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async run(request: PipelineRequestDto): Promise<PipelineReport> {
    return this.analyze(this.prepare(request));
  }

  /**
   * Stores the record first so it counts towards its own trend window, then the
   * finalized output. A failed analysis keeps the record and is audited.
   */
  async runAndPersist(request: PipelineRequestDto): Promise<PipelineReport> {
    const prepared = this.prepare(request);
    const { userId } = prepared.record;
    this.store.saveRecord(prepared.record);

    let report: PipelineReport;
    try {
      report = await this.analyze(prepared);
    } catch (err) {
      this.auditLog.log({
        userId,
        action: "analysis.failed",
        resource: "lifestyle_record",
        details: {
          timestamp: prepared.record.timestamp,
          kind: isPipelineError(err) ? err.kind : "system",
        },
      });
      throw err;
    }
    this.store.saveInsights(userId, report.insights, report.content);
    return report;
  }

  /** Records arrive validated; only their shape is re-checked after sanitising. */
  private prepare(request: PipelineRequestDto): PreparedRun {
    const options = requestOptionsSchema.safeParse(request);
    if (!options.success) {
      const [issue] = options.error.issues;
      throw new ValidationError(issue.path.join("."), issue.message);
    }
    const record = this.validator.parseRecord(this.validator.sanitize(request.record));
    return {
      record,
      bodyType: options.data.bodyType,
      history: options.data.history,
      timeRange: options.data.timeRange ?? this.defaultRange(record),
    };
  }

  private async analyze({ record, bodyType, history, timeRange }: PreparedRun): Promise<PipelineReport> {
    // All analyzers must settle before aggregation
    const [perRecord, trend] = await Promise.all([
      this.analyzeRecord(record, bodyType),
      this.analyzeTrend(record.userId, timeRange, history),
    ]);
    const results: AnalysisResult[] = [
      ...perRecord,
      { source: "trend", confidence: trend.confidence, data: trend },
    ];

    const insights = this.insights.generate(results);
    const content = insights.map((insight) => this.content.translate(insight));
    const notices = this.collectNotices(results);

    this.logger.log(
      `Analysed record for user ${record.userId}: ${results.length} result(s), ${insights.length} insight(s), ${notices.length} notice(s)`,
    );

    return {
      userId: record.userId,
      generatedAt: new Date().toISOString(),
      results,
      insights,
      content,
      notices,
    };
  }

  private async analyzeRecord(record: LifestyleRecord, bodyType: BodyType): Promise<AnalysisResult[]> {
    const results: AnalysisResult[] = record.foodItems.map((item) => {
      const data = this.food.classify(item);
      return { source: "food", confidence: data.confidence, data };
    });

    const retention = this.water.predict(record, bodyType);
    results.push({ source: "water", confidence: retention.confidence, data: retention });

    if (record.sleep) {
      const sleep = this.sleep.analyze(record.sleep, record);
      results.push({ source: "sleep", confidence: sleep.confidence, data: sleep });
    }

    const body = this.bodyType.analyze(bodyType, record);
    results.push({ source: "body_type", confidence: body.confidence, data: body });
    return results;
  }

  private async analyzeTrend(
    userId: string,
    timeRange: TimeRange,
    history: readonly LifestyleRecord[] | undefined,
  ): Promise<TrendAnalysis> {
    if (history) return this.trends.analyzeTrends(history, timeRange);
    const series = await this.historyFeed.fetchSeries(userId, timeRange);
    return this.trends.analyzeSeries(series, timeRange);
  }

  private defaultRange(record: LifestyleRecord): TimeRange {
    const end = Date.parse(record.timestamp);
    return {
      start: new Date(end - this.config.trendWindowDays * DAY_MS).toISOString(),
      end: new Date(end).toISOString(),
    };
  }

  private collectNotices(results: readonly AnalysisResult[]): PipelineIssue[] {
    return results.flatMap((result) => {
      switch (result.source) {
        case "food":
        case "trend":
          return result.data.notices;
        default:
          return [];
      }
    });
  }
}
