import { Module } from "@nestjs/common";
import { EducationalContentService } from "./educational-content.service";
import { InsightGeneratorService } from "./insight-generator.service";

@Module({
  providers: [InsightGeneratorService, EducationalContentService],
  exports: [InsightGeneratorService, EducationalContentService],
})
export class InsightsModule {}
