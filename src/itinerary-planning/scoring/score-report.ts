// src/itinerary-planning/scoring/score-report.ts

/**
 * ScoreReport - 自检报告
 *
 * 约定：分数越低越好。penalties 按日期排序，同日内按 PENALTY_KIND_ORDER 排序。
 */

export type PenaltyKind =
  | 'travel'
  | 'underfill'
  | 'overfill'
  | 'closed'
  | 'duplicate'
  | 'unknown';

export const PENALTY_KIND_ORDER: readonly PenaltyKind[] = [
  'travel',
  'underfill',
  'overfill',
  'closed',
  'duplicate',
  'unknown',
];

export interface PenaltyItem {
  day: number;
  kind: PenaltyKind;
  amount: number;   // 超出分钟数 / 缺少或多出的 spot 数 / 1
  penalty: number;  // 计入总分的罚分
  spotId?: string;
  message: string;
}

export type HardViolationCode =
  | 'CLOSED_SPOT'
  | 'DUPLICATE_SPOT'
  | 'UNKNOWN_SPOT'
  | 'INSUFFICIENT_SPOTS';

export interface HardViolation {
  code: HardViolationCode;
  day?: number;
  spotId?: string;
  message: string;
}

export interface DaySummary {
  day: number;
  spotCount: number;
  travelMinutes: number;
  distanceKm: number;
  visitMinutes: number;
}

export interface ScoreReport {
  totalScore: number;
  feasible: boolean;
  penalties: PenaltyItem[];
  violations: HardViolation[];
  days: DaySummary[];
}
