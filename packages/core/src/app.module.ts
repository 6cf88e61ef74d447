import { Module } from "@nestjs/common";
import type { DynamicModule } from "@nestjs/common";
import { PipelineConfigModule } from "./config/config.module";
import { EncryptionModule } from "./encryption/encryption.module";
import { PipelineModule } from "./pipeline/pipeline.module";
import { PrivacyModule } from "./privacy/privacy.module";

@Module({})
export class AppModule {
  static forRoot(source: Record<string, string | undefined> = process.env): DynamicModule {
    return {
      module: AppModule,
      imports: [PipelineConfigModule.forRoot(source), EncryptionModule, PrivacyModule, PipelineModule],
    };
  }
}
