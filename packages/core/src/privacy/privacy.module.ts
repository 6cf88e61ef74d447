import { Module } from "@nestjs/common";
import { HISTORY_REPOSITORY } from "../trends/history.repository";
import { AuditLogService } from "./audit-log.service";
import { PrivacyService } from "./privacy.service";
import { UserDataStoreService } from "./user-data-store.service";

@Module({
  providers: [
    AuditLogService,
    UserDataStoreService,
    PrivacyService,
    { provide: HISTORY_REPOSITORY, useExisting: UserDataStoreService },
  ],
  exports: [AuditLogService, UserDataStoreService, PrivacyService, HISTORY_REPOSITORY],
})
export class PrivacyModule {}
