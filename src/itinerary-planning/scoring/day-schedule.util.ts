// src/itinerary-planning/scoring/day-schedule.util.ts

import { DateTime, Duration } from 'luxon';
import { travelTime } from '../geometry/world-geometry';
import { ISOTime, OpeningWindow, Policy, Spot } from '../world-model';

const MINUTES_PER_DAY = 24 * 60;

export interface ScheduledVisit {
  spot: Spot;
  arriveMin: number;
  startMin: number;
  endMin: number;
  withinOpeningHours: boolean;
}

/**
 * 将 HH:mm 转换为当天分钟数；无法解析时返回 undefined
 */
export function hhmmToMin(hhmm: ISOTime): number | undefined {
  const parsed = DateTime.fromFormat(hhmm, 'HH:mm');
  if (!parsed.isValid) return undefined;
  return parsed.hour * 60 + parsed.minute;
}

/**
 * 分钟数转 HH:mm（超过 24 小时继续累加，如 25:10）
 */
export function minToHhmm(min: number): string {
  return Duration.fromObject({ minutes: Math.round(min) }).toFormat('hh:mm');
}

function windowMinutes(window: OpeningWindow): { open: number; close: number } | undefined {
  const open = hhmmToMin(window.open);
  const close = hhmmToMin(window.close);
  if (open === undefined || close === undefined) return undefined;

  // 跨午夜营业，例如 18:00 - 02:00
  return { open, close: close <= open ? close + MINUTES_PER_DAY : close };
}

/**
 * 从 dayStart 开始模拟一天的访问：早到则等待开门，
 * 无法在闭馆前完成访问的记为 withinOpeningHours = false。
 * 开放时间无法解析的 spot 视为全天开放。
 */
export function simulateDay(
  spots: readonly Spot[],
  policy: Policy,
  dayStartMin: number,
): ScheduledVisit[] {
  const visits: ScheduledVisit[] = [];
  let clock = dayStartMin;

  for (let i = 0; i < spots.length; i++) {
    const spot = spots[i];
    if (i > 0) {
      clock += travelTime(spots[i - 1], spot, policy);
    }

    const arriveMin = clock;
    let startMin = arriveMin;
    let withinOpeningHours = true;

    const window = spot.openingHours ? windowMinutes(spot.openingHours) : undefined;
    if (window) {
      startMin = Math.max(arriveMin, window.open);
      withinOpeningHours = startMin + spot.visitDurationMin <= window.close;
    }

    const endMin = startMin + spot.visitDurationMin;
    visits.push({ spot, arriveMin, startMin, endMin, withinOpeningHours });
    clock = endMin;
  }

  return visits;
}
