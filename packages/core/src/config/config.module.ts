import { Global, Module } from "@nestjs/common";
import type { DynamicModule } from "@nestjs/common";
import { PIPELINE_CONFIG, loadPipelineConfig } from "./pipeline.config";

@Global()
@Module({})
export class PipelineConfigModule {
  /** Settings are read from `source` once, when the module is built. */
  static forRoot(source: Record<string, string | undefined> = process.env): DynamicModule {
    return {
      module: PipelineConfigModule,
      global: true,
      providers: [{ provide: PIPELINE_CONFIG, useValue: loadPipelineConfig(source) }],
      exports: [PIPELINE_CONFIG],
    };
  }
}
