import { Module } from "@nestjs/common";
import { SleepAnalyzerService } from "./sleep-analyzer.service";

@Module({
  providers: [SleepAnalyzerService],
  exports: [SleepAnalyzerService],
})
export class SleepModule {}
