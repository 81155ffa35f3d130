// src/itinerary-planning/itinerary-planning.module.ts

/**
 * Itinerary Planning Module
 *
 * 规划核心：目录加载、软约束评分、构造 + 局部搜索、雨天修复
 */

import { Module } from '@nestjs/common';
import { CatalogLoaderService } from './catalog/catalog-loader.service';
import { ItineraryPlannerService } from './planner/itinerary-planner.service';
import { WeatherReplannerService } from './replanning/weather-replanner.service';
import { SoftConstraintScorer } from './scoring/soft-constraint-scorer.service';

@Module({
  providers: [
    CatalogLoaderService,
    SoftConstraintScorer,
    ItineraryPlannerService,
    WeatherReplannerService,
  ],
  exports: [
    CatalogLoaderService,
    SoftConstraintScorer,
    ItineraryPlannerService,
    WeatherReplannerService,
  ],
})
export class ItineraryPlanningModule {}
