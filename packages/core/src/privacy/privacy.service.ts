import { Injectable, Logger } from "@nestjs/common";
import type { DataExportResponse, DeletionConfirmation } from "@habitlens/shared";
import { AuditLogService } from "./audit-log.service";
import { UserDataStoreService } from "./user-data-store.service";

@Injectable()
export class PrivacyService {
  private readonly logger = new Logger(PrivacyService.name);

  constructor(
    private readonly store: UserDataStoreService,
    private readonly auditLog: AuditLogService,
  ) {}

  exportUserData(userId: string): DataExportResponse {
    const data = this.store.load(userId);
    this.auditLog.log({
      userId,
      action: "data.exported",
      resource: "user_data",
      details: {
        records: data.records.length,
        insights: data.insights.length,
        content: data.content.length,
      },
    });
    this.logger.log(`Exported data for user ${userId}`);

    return {
      userId,
      exportDate: new Date().toISOString(),
      format: "json",
      data,
    };
  }

  deleteUserData(userId: string): DeletionConfirmation {
    const removed = this.store.remove(userId);
    this.auditLog.log({ userId, action: "data.deleted", resource: "user_data", details: removed });
    this.logger.log(`Deleted data for user ${userId}`);

    return {
      userId,
      deletionDate: new Date().toISOString(),
      status: "completed",
      removed,
    };
  }
}
