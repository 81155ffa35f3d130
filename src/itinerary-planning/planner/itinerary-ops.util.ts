// src/itinerary-planning/planner/itinerary-ops.util.ts

import { Itinerary } from '../world-model';

export function cloneItinerary(itinerary: Itinerary): Itinerary {
  return {
    cityId: itinerary.cityId,
    days: itinerary.days.map(d => ({ day: d.day, spotIds: [...d.spotIds] })),
  };
}

export function assignedSpotIds(itinerary: Itinerary): string[] {
  return itinerary.days.flatMap(d => d.spotIds);
}

/**
 * 不变量检查：每个 spot 恰好出现一次，且集合与 expected 相同。
 * 违反说明算子实现有误，直接中止运行。
 */
export function assertExclusiveAssignment(
  itinerary: Itinerary,
  expected: ReadonlySet<string>,
  context: string,
): void {
  const seen = new Set<string>();
  for (const day of itinerary.days) {
    for (const id of day.spotIds) {
      if (seen.has(id)) {
        throw new Error(
          `Internal invariant violated: spot "${id}" assigned to more than one day after ${context}`,
        );
      }
      if (!expected.has(id)) {
        throw new Error(`Internal invariant violated: unexpected spot "${id}" after ${context}`);
      }
      seen.add(id);
    }
  }

  if (seen.size !== expected.size) {
    throw new Error(
      `Internal invariant violated: ${expected.size - seen.size} spot(s) lost after ${context}`,
    );
  }
}
