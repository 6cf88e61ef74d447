import { Injectable } from "@nestjs/common";
import type { AuditAction, AuditLogEntry, AuditLogResponse } from "@habitlens/shared";
import { randomUUID } from "crypto";

@Injectable()
export class AuditLogService {
  private readonly entries: AuditLogEntry[] = [];

  log(params: {
    userId: string;
    action: AuditAction;
    resource: string;
    details?: Record<string, unknown>;
  }): AuditLogEntry {
    const entry: AuditLogEntry = {
      id: randomUUID(),
      userId: params.userId,
      action: params.action,
      resource: params.resource,
      details: params.details ?? null,
      createdAt: new Date().toISOString(),
    };
    this.entries.push(entry);
    return entry;
  }

  /** Newest first. */
  findByUser(userId: string, limit = 50, offset = 0): AuditLogResponse {
    const matching = this.entries.filter((e) => e.userId === userId).reverse();
    return { data: matching.slice(offset, offset + limit), total: matching.length };
  }
}
