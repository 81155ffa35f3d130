// src/itinerary-planning/replanning/spot-semantics.ts

import { Spot } from '../world-model';

export const OUTDOOR_CATEGORIES: ReadonlySet<string> = new Set(['outdoor', 'beach', 'park', 'garden']);

export const INDOOR_CATEGORIES: ReadonlySet<string> = new Set(['indoor', 'museum', 'shopping', 'temple']);

export function isOutdoor(spot: Spot): boolean {
  return OUTDOOR_CATEGORIES.has(spot.category);
}

export function isIndoor(spot: Spot): boolean {
  return INDOOR_CATEGORIES.has(spot.category);
}
