import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import type { INestApplicationContext } from "@nestjs/common";
import { AppModule } from "./app.module";
import { enabledLogLevels, loadPipelineConfig } from "./config/pipeline.config";

export { AppModule } from "./app.module";
export * from "./common/errors";
export * from "./config/pipeline.config";
export { PipelineConfigModule } from "./config/config.module";
export { EncryptionService } from "./encryption/encryption.service";
export { FoodClassifierService } from "./food/food-classifier.service";
export { WaterRetentionService } from "./water/water-retention.service";
export { SleepAnalyzerService } from "./sleep/sleep-analyzer.service";
export { BodyTypeAnalyzerService } from "./body-type/body-type-analyzer.service";
export { TrendAnalyzerService } from "./trends/trend-analyzer.service";
export { HistoryFeedService } from "./trends/history-feed.service";
export { HISTORY_REPOSITORY } from "./trends/history.repository";
export type { HistoryRepository } from "./trends/history.repository";
export { InsightGeneratorService } from "./insights/insight-generator.service";
export { EducationalContentService } from "./insights/educational-content.service";
export { InputValidatorService } from "./validation/input-validator.service";
export { AuditLogService } from "./privacy/audit-log.service";
export { PrivacyService } from "./privacy/privacy.service";
export { UserDataStoreService } from "./privacy/user-data-store.service";
export { LifestylePipelineService } from "./pipeline/lifestyle-pipeline.service";

/** Boots the pipeline without a transport, logging at LOG_LEVEL and above. */
export async function createLifestyleContext(
  source: Record<string, string | undefined> = process.env,
): Promise<INestApplicationContext> {
  const { logLevel } = loadPipelineConfig(source);
  return NestFactory.createApplicationContext(AppModule.forRoot(source), { logger: enabledLogLevels(logLevel) });
}
