import { Logger } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import { INSIGHT_CATEGORY_CONFIG } from "@habitlens/shared";
import { SystemError, ValidationError } from "../common/errors";
import { PipelineConfigModule } from "../config/config.module";
import { EncryptionModule } from "../encryption/encryption.module";
import { AuditLogService } from "../privacy/audit-log.service";
import { PrivacyService } from "../privacy/privacy.service";
import { UserDataStoreService } from "../privacy/user-data-store.service";
import { buildFood, buildHistory, buildRecord, buildSleep } from "../testing/lifestyle.fixtures";
import { LifestylePipelineService } from "./lifestyle-pipeline.service";
import { PipelineModule } from "./pipeline.module";

const INSUFFICIENT_HISTORY = "At least 7 entries of a metric are needed before trends can be detected.";

describe("LifestylePipelineService", () => {
  let pipeline: LifestylePipelineService;
  let store: UserDataStoreService;
  let privacy: PrivacyService;
  let auditLog: AuditLogService;

  const salty = buildRecord({
    foodItems: [buildFood("Instant noodles", { sodium: 900 })],
    waterIntake: 500,
    sleep: buildSleep({ quality: 3 }),
  });

  beforeEach(async () => {
    for (const level of ["log", "debug", "warn", "error"] as const) {
      jest.spyOn(Logger.prototype, level).mockImplementation(() => undefined);
    }

    const module = await Test.createTestingModule({
      imports: [
        PipelineConfigModule.forRoot({ DATA_ENCRYPTION_KEY: "ab".repeat(32), HISTORY_TIMEOUT_MS: "100" }),
        EncryptionModule,
        PipelineModule,
      ],
    }).compile();

    pipeline = module.get(LifestylePipelineService);
    store = module.get(UserDataStoreService);
    privacy = module.get(PrivacyService);
    auditLog = module.get(AuditLogService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("runs every analyzer and joins their results", async () => {
    const report = await pipeline.run({ record: salty, bodyType: "mesomorph", history: [] });

    expect(report.userId).toBe("user-1");
    expect(report.results.map((r) => r.source)).toEqual(["food", "water", "sleep", "body_type", "trend"]);

    const water = report.results.find((r) => r.source === "water");
    expect(water?.source === "water" && water.data.level).toBe("high");
    expect(water?.source === "water" && water.data.primaryFactor.type).toBe("sodium");
  });

  it("translates every insight and keeps disclaimers on health topics", async () => {
    const report = await pipeline.run({ record: salty, bodyType: "mesomorph", history: [] });

    expect(report.insights.length).toBeGreaterThan(0);
    expect(report.content.map((c) => c.insightId)).toEqual(report.insights.map((i) => i.id));
    for (const content of report.content) {
      if (INSIGHT_CATEGORY_CONFIG[content.category].healthRelated) {
        expect(content.disclaimer).toEqual(expect.any(String));
      }
    }
    expect(report.insights[0].priority).toBe("high");
  });

  it("skips sleep analysis when no sleep was logged", async () => {
    const report = await pipeline.run({ record: buildRecord(), bodyType: "ectomorph", history: [] });

    expect(report.results.map((r) => r.source)).toEqual(["water", "body_type", "trend"]);
  });

  it("analyses a record that only logs water", async () => {
    const report = await pipeline.run({ record: buildRecord({ waterIntake: 1200 }), bodyType: "mesomorph", history: [] });

    const water = report.results.find((r) => r.source === "water");
    expect(water?.source === "water" && water.data.primaryFactor.type).toBe("hydration");
  });

  it("reports short history as a notice rather than failing", async () => {
    const report = await pipeline.run({ record: buildRecord(), bodyType: "mixed", history: [] });

    expect(report.notices).toContainEqual({
      kind: "processing",
      message: INSUFFICIENT_HISTORY,
      recovery: "Keep logging daily; trends appear after about a week of entries.",
    });
  });

  it("detects trends from supplied history", async () => {
    const history = buildHistory(10, (day) => ({ waterIntake: 1000 + day * 200 }));

    const today = buildRecord({ timestamp: "2026-03-11T08:00:00.000Z" });

    const report = await pipeline.run({ record: today, bodyType: "mesomorph", history });

    const trend = report.results.find((r) => r.source === "trend");
    expect(trend?.source === "trend" && trend.data.patterns[0]).toMatchObject({
      metric: "water_intake",
      trend: "increasing",
    });
  });

  it("reads history from the store when none is supplied", async () => {
    for (const record of buildHistory(10, (day) => ({ waterIntake: 3000 - day * 200 }))) {
      store.saveRecord(record);
    }
    const today = buildRecord({ timestamp: "2026-03-11T08:00:00.000Z", waterIntake: 1000 });

    const report = await pipeline.run({ record: today, bodyType: "mesomorph" });

    const trend = report.results.find((r) => r.source === "trend");
    expect(trend?.source === "trend" && trend.data.patterns[0]).toMatchObject({
      metric: "water_intake",
      trend: "decreasing",
    });
  });

  it("persists the record and its output", async () => {
    const report = await pipeline.runAndPersist({ record: salty, bodyType: "mesomorph" });

    const exported = privacy.exportUserData("user-1");
    expect(exported.data.records).toEqual([salty]);
    expect(exported.data.insights).toEqual(report.insights);
    expect(exported.data.content).toEqual(report.content);
  });

  it("rejects an invalid record naming the field", async () => {
    const record = buildRecord({ sleep: buildSleep({ quality: 0 }) });

    const error: unknown = await pipeline
      .run({ record, bodyType: "mesomorph", history: [] })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toHaveProperty("field", "sleep.quality");
  });

  it("rejects a time range that ends before it starts", async () => {
    const timeRange = { start: "2026-03-10T00:00:00.000Z", end: "2026-03-01T00:00:00.000Z" };

    const error: unknown = await pipeline
      .run({ record: salty, bodyType: "mesomorph", timeRange })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toHaveProperty("field", "timeRange.start");
    expect(error).toHaveProperty("message", "start must not be after end");
  });

  it("surfaces a failing history repository as a SystemError", async () => {
    jest.spyOn(store, "fetch").mockRejectedValue(new Error("storage offline"));

    await expect(pipeline.run({ record: salty, bodyType: "mesomorph" })).rejects.toThrow(SystemError);
  });

  it("keeps the record and audits a failed persisted run", async () => {
    jest.spyOn(store, "fetch").mockRejectedValue(new Error("storage offline"));

    await expect(pipeline.runAndPersist({ record: salty, bodyType: "mesomorph" })).rejects.toThrow(SystemError);

    expect(store.load("user-1")).toMatchObject({ records: [salty], insights: [], content: [] });
    expect(auditLog.findByUser("user-1").data[0]).toMatchObject({
      action: "analysis.failed",
      details: { timestamp: salty.timestamp, kind: "system" },
    });
  });
});
