import { Module } from "@nestjs/common";
import { PrivacyModule } from "../privacy/privacy.module";
import { HistoryFeedService } from "./history-feed.service";
import { TrendAnalyzerService } from "./trend-analyzer.service";

@Module({
  imports: [PrivacyModule],
  providers: [TrendAnalyzerService, HistoryFeedService],
  exports: [TrendAnalyzerService, HistoryFeedService],
})
export class TrendsModule {}
