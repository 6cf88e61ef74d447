import { Module } from "@nestjs/common";
import { WaterRetentionService } from "./water-retention.service";

@Module({
  providers: [WaterRetentionService],
  exports: [WaterRetentionService],
})
export class WaterModule {}
