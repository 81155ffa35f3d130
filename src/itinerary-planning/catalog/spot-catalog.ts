// src/itinerary-planning/catalog/spot-catalog.ts

/**
 * Spot Catalog - 只读目录（City → Spot）
 *
 * 在运行开始时显式构造并传入 Planner，不使用模块级可变状态，
 * 多个并发规划运行可以共享同一个实例。
 */

import { BoundingRegion, City, DayPlan, Itinerary, Spot } from '../world-model';

export type StructuralViolationCode = 'UNKNOWN_SPOT' | 'DUPLICATE_SPOT';

export interface StructuralViolation {
  code: StructuralViolationCode;
  day: number;
  spotId: string;
  firstDay?: number; // DUPLICATE_SPOT: 第一次出现的日期
  message: string;
}

export interface StructuralValidationResult {
  feasible: boolean;
  violations: StructuralViolation[];
}

export class SpotCatalog {
  private readonly spotsById: ReadonlyMap<string, Spot>;
  private readonly citiesById: ReadonlyMap<string, City>;

  constructor(cities: readonly City[], spots: readonly Spot[]) {
    this.spotsById = new Map(spots.map(s => [s.id, s]));
    this.citiesById = new Map(cities.map(c => [c.id, c]));
  }

  /**
   * 单城市目录；边界由 spot 坐标推出
   */
  static forCity(cityId: string, cityName: string, spots: readonly Spot[]): SpotCatalog {
    const city: City = {
      id: cityId,
      name: cityName,
      bounds: boundsOf(spots),
      spotIds: spots.map(s => s.id),
    };
    return new SpotCatalog([city], spots);
  }

  getSpot(id: string): Spot | undefined {
    return this.spotsById.get(id);
  }

  hasSpot(id: string): boolean {
    return this.spotsById.has(id);
  }

  getCity(id: string): City | undefined {
    return this.citiesById.get(id);
  }

  listCities(): City[] {
    return [...this.citiesById.values()];
  }

  /**
   * 城市内的 spot，按城市登记顺序；目录中不存在的 id 直接跳过
   */
  listSpotsByCity(cityId: string): Spot[] {
    const city = this.citiesById.get(cityId);
    if (!city) return [];

    const spots: Spot[] = [];
    for (const id of city.spotIds) {
      const spot = this.spotsById.get(id);
      if (spot) spots.push(spot);
    }
    return spots;
  }

  /**
   * 按访问顺序解析一天中已知的 spot
   */
  resolveDay(day: DayPlan): Spot[] {
    const spots: Spot[] = [];
    for (const id of day.spotIds) {
      const spot = this.spotsById.get(id);
      if (spot) spots.push(spot);
    }
    return spots;
  }

  /**
   * 结构校验：spotId 必须属于目录，且整个行程中至多出现一次
   */
  validate(itinerary: Itinerary): StructuralValidationResult {
    const violations: StructuralViolation[] = [];
    const seenOnDay = new Map<string, number>();

    for (const day of itinerary.days) {
      for (const spotId of day.spotIds) {
        if (!this.spotsById.has(spotId)) {
          violations.push({
            code: 'UNKNOWN_SPOT',
            day: day.day,
            spotId,
            message: `Day ${day.day}: spot "${spotId}" is not in the catalog`,
          });
          continue;
        }

        const firstDay = seenOnDay.get(spotId);
        if (firstDay !== undefined) {
          violations.push({
            code: 'DUPLICATE_SPOT',
            day: day.day,
            spotId,
            firstDay,
            message: `Day ${day.day}: spot "${spotId}" is already assigned to day ${firstDay}`,
          });
          continue;
        }
        seenOnDay.set(spotId, day.day);
      }
    }

    return {
      feasible: violations.length === 0,
      violations,
    };
  }
}

function boundsOf(spots: readonly Spot[]): BoundingRegion {
  if (spots.length === 0) {
    return { north: 0, south: 0, east: 0, west: 0 };
  }

  const lats = spots.map(s => s.location.lat);
  const lngs = spots.map(s => s.location.lng);
  return {
    north: Math.max(...lats),
    south: Math.min(...lats),
    east: Math.max(...lngs),
    west: Math.min(...lngs),
  };
}
