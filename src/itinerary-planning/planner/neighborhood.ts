// src/itinerary-planning/planner/neighborhood.ts

/**
 * 局部搜索邻域：move / swap 两类算子
 *
 * 邻域是有限、可枚举的显式列表，顺序即稳定性偏好：
 * 单点移动（1 次重定位）→ 同日换序 → 跨日交换（2 次重定位）。
 */

import { Itinerary } from '../world-model';
import { cloneItinerary } from './itinerary-ops.util';

export interface MoveOperator {
  type: 'move';
  fromDay: number;     // itinerary.days 下标
  fromIndex: number;
  toDay: number;
  toIndex: number;     // 插入位置（按移出后的目标日计算）
  relocations: 1;
}

export interface SwapOperator {
  type: 'swap';
  dayA: number;
  indexA: number;
  dayB: number;        // 与 dayA 相同时为同日换序
  indexB: number;
  relocations: 2;
}

export type NeighborOperator = MoveOperator | SwapOperator;

export function enumerateNeighborhood(itinerary: Itinerary): NeighborOperator[] {
  const days = itinerary.days;
  const moves: NeighborOperator[] = [];
  const reorders: NeighborOperator[] = [];
  const swaps: NeighborOperator[] = [];

  for (let d = 0; d < days.length; d++) {
    for (let i = 0; i < days[d].spotIds.length; i++) {
      for (let t = 0; t < days.length; t++) {
        if (t === d) continue;
        for (let p = 0; p <= days[t].spotIds.length; p++) {
          moves.push({ type: 'move', fromDay: d, fromIndex: i, toDay: t, toIndex: p, relocations: 1 });
        }
      }
    }
  }

  for (let d = 0; d < days.length; d++) {
    const len = days[d].spotIds.length;
    for (let i = 0; i < len; i++) {
      for (let j = i + 1; j < len; j++) {
        reorders.push({ type: 'swap', dayA: d, indexA: i, dayB: d, indexB: j, relocations: 2 });
      }
    }
  }

  for (let a = 0; a < days.length; a++) {
    for (let b = a + 1; b < days.length; b++) {
      for (let i = 0; i < days[a].spotIds.length; i++) {
        for (let j = 0; j < days[b].spotIds.length; j++) {
          swaps.push({ type: 'swap', dayA: a, indexA: i, dayB: b, indexB: j, relocations: 2 });
        }
      }
    }
  }

  return [...moves, ...reorders, ...swaps];
}

/**
 * 生成新的候选行程，不修改输入
 */
export function applyOperator(itinerary: Itinerary, op: NeighborOperator): Itinerary {
  const next = cloneItinerary(itinerary);

  if (op.type === 'move') {
    const [spotId] = next.days[op.fromDay].spotIds.splice(op.fromIndex, 1);
    next.days[op.toDay].spotIds.splice(op.toIndex, 0, spotId);
    return next;
  }

  const a = next.days[op.dayA].spotIds;
  const b = next.days[op.dayB].spotIds;
  const held = a[op.indexA];
  a[op.indexA] = b[op.indexB];
  b[op.indexB] = held;
  return next;
}

export function describeOperator(itinerary: Itinerary, op: NeighborOperator): string {
  if (op.type === 'move') {
    const spotId = itinerary.days[op.fromDay].spotIds[op.fromIndex];
    return (
      `move "${spotId}" from day ${itinerary.days[op.fromDay].day} ` +
      `to day ${itinerary.days[op.toDay].day} at position ${op.toIndex + 1}`
    );
  }

  const first = itinerary.days[op.dayA].spotIds[op.indexA];
  const second = itinerary.days[op.dayB].spotIds[op.indexB];
  if (op.dayA === op.dayB) {
    return `reorder "${first}" and "${second}" on day ${itinerary.days[op.dayA].day}`;
  }
  return (
    `swap "${first}" (day ${itinerary.days[op.dayA].day}) ` +
    `with "${second}" (day ${itinerary.days[op.dayB].day})`
  );
}
