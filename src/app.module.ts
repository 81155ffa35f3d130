// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ItineraryPlanningModule } from './itinerary-planning';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    ItineraryPlanningModule, // 行程规划核心（评分 + 局部搜索）
  ],
})
export class AppModule {}
