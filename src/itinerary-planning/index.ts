// src/itinerary-planning/index.ts

// 世界模型
export * from './world-model';

// 目录
export * from './catalog/spot-catalog';
export * from './catalog/catalog-loader.service';

// 配置
export * from './dto/scoring-config.dto';
export * from './dto/spot-record.dto';

// 几何
export * from './geometry/world-geometry';

// 评分
export * from './scoring/score-report';
export * from './scoring/soft-constraint-scorer.service';

// 规划
export * from './planner/construction';
export * from './planner/neighborhood';
export * from './planner/explanation';
export * from './planner/itinerary-planner.service';

// 雨天修复
export * from './replanning/spot-semantics';
export * from './replanning/weather-replanner.service';

// 模块
export * from './itinerary-planning.module';
