// src/itinerary-planning/scoring/soft-constraint-scorer.service.ts

/**
 * Soft Constraint Scorer - 软约束评分器
 *
 * 输出 ScoreReport（总分 + 逐项罚分 + 可行性），作为 Planner 的目标函数。
 * 不抛异常：结构问题通过 feasible 标记和高额罚分表达，搜索仍可比较不可行候选。
 */

import { Injectable } from '@nestjs/common';
import { SpotCatalog, StructuralViolation } from '../catalog/spot-catalog';
import { ScoringConfig } from '../dto/scoring-config.dto';
import { dayDistanceKm, dayTravelTime } from '../geometry/world-geometry';
import { DayPlan, Itinerary, Policy } from '../world-model';
import { hhmmToMin, minToHhmm, simulateDay } from './day-schedule.util';
import {
  DaySummary,
  HardViolation,
  PENALTY_KIND_ORDER,
  PenaltyItem,
  ScoreReport,
} from './score-report';

/**
 * 每个结构违规计入的罚分，保证不可行候选总是排在可行候选之后
 */
export const STRUCTURAL_VIOLATION_PENALTY = 1_000_000;

/**
 * 罚分展示用：保留一位小数，整数不带小数点
 */
export function formatAmount(value: number): string {
  return String(Math.round(value * 10) / 10);
}

@Injectable()
export class SoftConstraintScorer {
  score(
    catalog: SpotCatalog,
    itinerary: Itinerary,
    policy: Policy,
    config: ScoringConfig,
  ): ScoreReport {
    const structural = catalog.validate(itinerary);
    const dayStartMin = hhmmToMin(config.dayStartTime) ?? 0;

    const penalties: PenaltyItem[] = [];
    const violations: HardViolation[] = [];
    const days: DaySummary[] = [];

    for (const day of itinerary.days) {
      const spots = catalog.resolveDay(day);
      const travelMinutes = dayTravelTime(spots, policy);
      const visitMinutes = spots.reduce((sum, s) => sum + s.visitDurationMin, 0);

      days.push({
        day: day.day,
        spotCount: day.spotIds.length,
        travelMinutes,
        distanceKm: dayDistanceKm(spots),
        visitMinutes,
      });

      penalties.push(...this.capacityPenalties(day, travelMinutes, config));

      // 开放时间：硬约束
      for (const visit of simulateDay(spots, policy, dayStartMin)) {
        if (visit.withinOpeningHours || !visit.spot.openingHours) continue;

        const window = visit.spot.openingHours;
        const message =
          `Day ${day.day}: "${visit.spot.name}" cannot be visited before closing at ${window.close} ` +
          `(arrives ${minToHhmm(visit.arriveMin)}, open ${window.open}-${window.close})`;
        penalties.push({
          day: day.day,
          kind: 'closed',
          amount: 1,
          penalty: config.closedSpotPenalty,
          spotId: visit.spot.id,
          message,
        });
        violations.push({ code: 'CLOSED_SPOT', day: day.day, spotId: visit.spot.id, message });
      }
    }

    for (const violation of structural.violations) {
      penalties.push(this.structuralPenalty(violation));
      violations.push({
        code: violation.code,
        day: violation.day,
        spotId: violation.spotId,
        message: violation.message,
      });
    }

    const assigned = new Set(
      itinerary.days.flatMap(d => d.spotIds).filter(id => catalog.hasSpot(id)),
    ).size;
    const required = itinerary.days.length * config.minSpotsPerDay;
    if (assigned < required) {
      violations.push({
        code: 'INSUFFICIENT_SPOTS',
        message:
          `Only ${assigned} spot(s) for ${itinerary.days.length} day(s); ` +
          `${required} are needed to meet the minimum of ${config.minSpotsPerDay} per day`,
      });
    }

    penalties.sort(
      (a, b) =>
        a.day - b.day ||
        PENALTY_KIND_ORDER.indexOf(a.kind) - PENALTY_KIND_ORDER.indexOf(b.kind),
    );

    return {
      totalScore: penalties.reduce((sum, p) => sum + p.penalty, 0),
      feasible: violations.length === 0,
      penalties,
      violations,
      days,
    };
  }

  /**
   * travel → underfill → overfill
   */
  private capacityPenalties(
    day: DayPlan,
    travelMinutes: number,
    config: ScoringConfig,
  ): PenaltyItem[] {
    const items: PenaltyItem[] = [];
    const count = day.spotIds.length;

    const overage = Math.max(0, travelMinutes - config.maxDailyTravelTime);
    if (overage > 0) {
      items.push({
        day: day.day,
        kind: 'travel',
        amount: overage,
        penalty: config.travelTimeWeight * overage,
        message: `Day ${day.day} exceeds travel-time budget by ${formatAmount(overage)} minutes`,
      });
    }

    const missing = Math.max(0, config.minSpotsPerDay - count);
    if (missing > 0) {
      items.push({
        day: day.day,
        kind: 'underfill',
        amount: missing,
        penalty: config.spotDurationWeight * missing,
        message: `Day ${day.day} has ${count} spot(s), below the minimum of ${config.minSpotsPerDay}`,
      });
    }

    const extra = Math.max(0, count - config.maxSpotsPerDay);
    if (extra > 0) {
      items.push({
        day: day.day,
        kind: 'overfill',
        amount: extra,
        penalty: config.spotDurationWeight * extra,
        message: `Day ${day.day} has ${count} spots, above the maximum of ${config.maxSpotsPerDay}`,
      });
    }

    return items;
  }

  private structuralPenalty(violation: StructuralViolation): PenaltyItem {
    return {
      day: violation.day,
      kind: violation.code === 'DUPLICATE_SPOT' ? 'duplicate' : 'unknown',
      amount: 1,
      penalty: STRUCTURAL_VIOLATION_PENALTY,
      spotId: violation.spotId,
      message: violation.message,
    };
  }
}
