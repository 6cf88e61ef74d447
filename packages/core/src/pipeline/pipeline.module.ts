import { Module } from "@nestjs/common";
import { BodyTypeModule } from "../body-type/body-type.module";
import { FoodModule } from "../food/food.module";
import { InsightsModule } from "../insights/insights.module";
import { PrivacyModule } from "../privacy/privacy.module";
import { SleepModule } from "../sleep/sleep.module";
import { TrendsModule } from "../trends/trends.module";
import { ValidationModule } from "../validation/validation.module";
import { WaterModule } from "../water/water.module";
import { LifestylePipelineService } from "./lifestyle-pipeline.service";

@Module({
  imports: [
    ValidationModule,
    FoodModule,
    WaterModule,
    SleepModule,
    BodyTypeModule,
    TrendsModule,
    InsightsModule,
    PrivacyModule,
  ],
  providers: [LifestylePipelineService],
  exports: [LifestylePipelineService],
})
export class PipelineModule {}
