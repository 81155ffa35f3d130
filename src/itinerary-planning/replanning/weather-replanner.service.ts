// src/itinerary-planning/replanning/weather-replanner.service.ts

/**
 * Weather Replanner - 雨天修复
 *
 * 雨天的户外 spot 与晴天的室内 spot 对调，双方保持原访问位置。
 * 输入行程不被修改；对调不改变 spot 集合，互斥不变量保持成立。
 */

import { Injectable, Logger } from '@nestjs/common';
import { SpotCatalog } from '../catalog/spot-catalog';
import { cloneItinerary } from '../planner/itinerary-ops.util';
import { Itinerary } from '../world-model';
import { isIndoor, isOutdoor } from './spot-semantics';

export interface RainSwap {
  rainyDay: number;
  outdoorSpotId: string;
  dryDay: number;
  indoorSpotId: string;
}

export interface RainReplanResult {
  itinerary: Itinerary;
  swaps: RainSwap[];
  unresolved: Array<{ day: number; spotId: string }>; // 找不到可对调的室内 spot
}

@Injectable()
export class WeatherReplannerService {
  private readonly logger = new Logger(WeatherReplannerService.name);

  replanForRain(
    catalog: SpotCatalog,
    itinerary: Itinerary,
    rainyDays: readonly number[],
  ): RainReplanResult {
    const next = cloneItinerary(itinerary);
    const rainy = new Set(rainyDays);
    const swaps: RainSwap[] = [];
    const unresolved: RainReplanResult['unresolved'] = [];

    const rainyPlans = next.days.filter(d => rainy.has(d.day)).sort((a, b) => a.day - b.day);
    const dryPlans = next.days.filter(d => !rainy.has(d.day)).sort((a, b) => a.day - b.day);

    for (const wetDay of rainyPlans) {
      for (let i = 0; i < wetDay.spotIds.length; i++) {
        const spot = catalog.getSpot(wetDay.spotIds[i]);
        if (!spot || !isOutdoor(spot)) continue;

        let swapped = false;
        for (const dryDay of dryPlans) {
          const j = dryDay.spotIds.findIndex(id => {
            const candidate = catalog.getSpot(id);
            return candidate !== undefined && isIndoor(candidate);
          });
          if (j < 0) continue;

          const indoorSpotId = dryDay.spotIds[j];
          dryDay.spotIds[j] = spot.id;
          wetDay.spotIds[i] = indoorSpotId;
          swaps.push({ rainyDay: wetDay.day, outdoorSpotId: spot.id, dryDay: dryDay.day, indoorSpotId });
          swapped = true;
          break;
        }

        if (!swapped) {
          unresolved.push({ day: wetDay.day, spotId: spot.id });
        }
      }
    }

    if (unresolved.length > 0) {
      this.logger.warn(
        `${unresolved.length} outdoor spot(s) stay on rainy days: no indoor spot left on dry days`,
      );
    }

    return { itinerary: next, swaps, unresolved };
  }
}
