import { Module } from "@nestjs/common";
import { BodyTypeAnalyzerService } from "./body-type-analyzer.service";

@Module({
  providers: [BodyTypeAnalyzerService],
  exports: [BodyTypeAnalyzerService],
})
export class BodyTypeModule {}
