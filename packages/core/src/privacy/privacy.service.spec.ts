import { Logger } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import { PipelineConfigModule } from "../config/config.module";
import { EncryptionModule } from "../encryption/encryption.module";
import { HISTORY_REPOSITORY } from "../trends/history.repository";
import { buildContent, buildInsight, buildRecord } from "../testing/lifestyle.fixtures";
import { AuditLogService } from "./audit-log.service";
import { PrivacyModule } from "./privacy.module";
import { PrivacyService } from "./privacy.service";
import { UserDataStoreService } from "./user-data-store.service";

describe("PrivacyService", () => {
  let privacy: PrivacyService;
  let store: UserDataStoreService;
  let auditLog: AuditLogService;
  let repository: unknown;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, "log").mockImplementation(() => undefined);

    const module = await Test.createTestingModule({
      imports: [
        PipelineConfigModule.forRoot({ DATA_ENCRYPTION_KEY: "ab".repeat(32) }),
        EncryptionModule,
        PrivacyModule,
      ],
    }).compile();

    privacy = module.get(PrivacyService);
    store = module.get(UserDataStoreService);
    auditLog = module.get(AuditLogService);
    repository = module.get(HISTORY_REPOSITORY);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("serves the store as the history repository", () => {
    expect(repository).toBe(store);
  });

  it("exports everything stored for the user", () => {
    const record = buildRecord();
    store.saveRecord(record);
    store.saveInsights("user-1", [buildInsight()], [buildContent()]);

    const exported = privacy.exportUserData("user-1");

    expect(exported.userId).toBe("user-1");
    expect(exported.format).toBe("json");
    expect(exported.data).toEqual({
      records: [record],
      insights: [buildInsight()],
      content: [buildContent()],
    });
    expect(auditLog.findByUser("user-1").data[0]).toMatchObject({
      action: "data.exported",
      details: { records: 1, insights: 1, content: 1 },
    });
  });

  it("deletes the user's data and confirms what was removed", () => {
    store.saveRecord(buildRecord());
    store.saveInsights("user-1", [buildInsight()], []);

    const confirmation = privacy.deleteUserData("user-1");

    expect(confirmation).toMatchObject({
      userId: "user-1",
      status: "completed",
      removed: { records: 1, insights: 1, content: 0 },
    });
    expect(privacy.exportUserData("user-1").data.records).toEqual([]);
    expect(auditLog.findByUser("user-1").data.map((e) => e.action)).toEqual([
      "data.exported",
      "data.deleted",
      "insights.stored",
      "record.stored",
    ]);
  });
});
