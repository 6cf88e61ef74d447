import { Module } from "@nestjs/common";
import { FoodClassifierService } from "./food-classifier.service";

@Module({
  providers: [FoodClassifierService],
  exports: [FoodClassifierService],
})
export class FoodModule {}
