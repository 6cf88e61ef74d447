import { Injectable, Logger } from "@nestjs/common";
import {
  educationalContentSchema,
  insightSchema,
  lifestyleRecordSchema,
} from "@habitlens/shared";
import type {
  EducationalContent,
  EncryptedPayload,
  Insight,
  LifestyleRecord,
  MetricPoint,
  StoredUserData,
  TimeRange,
  TrendMetric,
} from "@habitlens/shared";
import { EncryptionService } from "../encryption/encryption.service";
import type { HistoryRepository } from "../trends/history.repository";
import { metricPoints, orderedHistory } from "../trends/metrics";
import { AuditLogService } from "./audit-log.service";

interface EncryptedUserData {
  records: EncryptedPayload[];
  insights: EncryptedPayload[];
  content: EncryptedPayload[];
}

/**
 * Per-user storage; every record, insight and piece of content is held
 * encrypted. Also serves metric history to the trend analyzer.
 */
@Injectable()
export class UserDataStoreService implements HistoryRepository {
  private readonly logger = new Logger(UserDataStoreService.name);
  private readonly users = new Map<string, EncryptedUserData>();

  constructor(
    private readonly encryption: EncryptionService,
    private readonly auditLog: AuditLogService,
  ) {}

  private slot(userId: string): EncryptedUserData {
    let data = this.users.get(userId);
    if (!data) {
      data = { records: [], insights: [], content: [] };
      this.users.set(userId, data);
    }
    return data;
  }

  saveRecord(record: LifestyleRecord): void {
    this.slot(record.userId).records.push(this.encryption.encryptData(record));
    this.auditLog.log({
      userId: record.userId,
      action: "record.stored",
      resource: "lifestyle_record",
      details: { timestamp: record.timestamp },
    });
  }

  saveInsights(userId: string, insights: readonly Insight[], content: readonly EducationalContent[]): void {
    const data = this.slot(userId);
    data.insights.push(...insights.map((i) => this.encryption.encryptData(i)));
    data.content.push(...content.map((c) => this.encryption.encryptData(c)));
    this.auditLog.log({
      userId,
      action: "insights.stored",
      resource: "insight",
      details: { insights: insights.length, content: content.length },
    });
  }

  load(userId: string): StoredUserData {
    const data = this.users.get(userId);
    if (!data) return { records: [], insights: [], content: [] };
    return {
      records: data.records.map((p) => this.encryption.decryptData(p, lifestyleRecordSchema)),
      insights: data.insights.map((p) => this.encryption.decryptData(p, insightSchema)),
      content: data.content.map((p) => this.encryption.decryptData(p, educationalContentSchema)),
    };
  }

  /** Drops everything held for the user and reports how much was removed. */
  remove(userId: string): { records: number; insights: number; content: number } {
    const data = this.users.get(userId);
    this.users.delete(userId);
    return {
      records: data?.records.length ?? 0,
      insights: data?.insights.length ?? 0,
      content: data?.content.length ?? 0,
    };
  }

  async fetch(userId: string, metric: TrendMetric, timeRange: TimeRange): Promise<MetricPoint[]> {
    const { records } = this.load(userId);
    const points = metricPoints(orderedHistory(records, timeRange), metric);
    this.logger.debug(`Served ${points.length} ${metric} point(s) for user ${userId}`);
    return points;
  }
}
