// src/itinerary-planning/world-model.ts

/**
 * Itinerary World Model - 行程规划的世界模型
 *
 * 只有数据与不变量，不含算法：
 * Spot / City / Policy 是一次规划运行中的只读输入，
 * DayPlan / Itinerary 由 Planner 创建并在运行结束时拷贝返回。
 */

export type ISOTime = string; // '08:30'

export interface GeoPoint {
  lat: number;
  lng: number;
}

/**
 * 交通策略（封闭枚举，WorldGeometry 通过查表分派）
 */
export enum Policy {
  WALK = 'WALK',
  TRANSIT = 'TRANSIT',
  TAXI = 'TAXI',
}

export const ALL_POLICIES: readonly Policy[] = [Policy.WALK, Policy.TRANSIT, Policy.TAXI];

/**
 * 单一开放时间窗；close 不晚于 open 时视为跨午夜营业
 */
export interface OpeningWindow {
  open: ISOTime;
  close: ISOTime;
}

export interface Spot {
  readonly id: string;
  readonly name: string;
  readonly location: GeoPoint;
  readonly category: string;      // indoor / outdoor / museum / food ...
  readonly visitDurationMin: number;
  readonly openingHours?: OpeningWindow;
}

export interface BoundingRegion {
  north: number;
  south: number;
  east: number;
  west: number;
}

export interface City {
  readonly id: string;
  readonly name: string;
  readonly bounds: BoundingRegion;
  readonly spotIds: readonly string[];
}

/**
 * 一天的访问序列（顺序即访问顺序）
 */
export interface DayPlan {
  day: number;        // 1..N
  spotIds: string[];
}

/**
 * 不变量：同一 Itinerary 内任一 spotId 至多出现在一个 DayPlan 中
 */
export interface Itinerary {
  cityId: string;
  days: DayPlan[];
}
