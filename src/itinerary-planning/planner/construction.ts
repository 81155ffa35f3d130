// src/itinerary-planning/planner/construction.ts

/**
 * Construct：地理扫描 + 均分 + 最近邻排序
 *
 * MVP: 按经度（再按纬度）排序后切成 dayCount 段，段长最多相差 1，
 * 靠前的天多拿一个；所有可用 spot 都会被分配。
 */

import { distanceKm } from '../geometry/world-geometry';
import { Itinerary, Spot } from '../world-model';

export function geographicSweep(spots: readonly Spot[]): Spot[] {
  return spots
    .slice()
    .sort(
      (a, b) =>
        a.location.lng - b.location.lng ||
        a.location.lat - b.location.lat ||
        a.id.localeCompare(b.id),
    );
}

/**
 * 长度最多相差 1 的连续分段
 */
export function splitEvenly<T>(items: readonly T[], parts: number): T[][] {
  const base = Math.floor(items.length / parts);
  const extra = items.length % parts;
  const chunks: T[][] = [];

  let offset = 0;
  for (let i = 0; i < parts; i++) {
    const size = base + (i < extra ? 1 : 0);
    chunks.push(items.slice(offset, offset + size));
    offset += size;
  }
  return chunks;
}

/**
 * 从第一个点出发的最近邻路径；距离相同时保留原顺序
 */
export function nearestNeighborPath(spots: readonly Spot[]): Spot[] {
  if (spots.length === 0) return [];

  const unvisited = spots.slice(1);
  const path = [spots[0]];

  while (unvisited.length > 0) {
    const last = path[path.length - 1];
    let bestIndex = 0;
    let bestDistance = Infinity;

    unvisited.forEach((candidate, i) => {
      const d = distanceKm(last.location, candidate.location);
      if (d < bestDistance) {
        bestDistance = d;
        bestIndex = i;
      }
    });

    path.push(unvisited[bestIndex]);
    unvisited.splice(bestIndex, 1);
  }

  return path;
}

export function constructItinerary(
  cityId: string,
  spots: readonly Spot[],
  dayCount: number,
): Itinerary {
  const chunks = splitEvenly(geographicSweep(spots), dayCount);

  return {
    cityId,
    days: chunks.map((chunk, i) => ({
      day: i + 1,
      spotIds: nearestNeighborPath(chunk).map(s => s.id),
    })),
  };
}
