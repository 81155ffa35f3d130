// src/itinerary-planning/planner/explanation.ts

import { formatAmount } from '../scoring/soft-constraint-scorer.service';
import { ScoreReport } from '../scoring/score-report';

export type StopReason = 'local_optimum' | 'iteration_budget' | 'time_budget';

export interface ExplanationInput {
  report: ScoreReport;
  initialScore: number;
  stopReason: StopReason;
  evaluations: number;
  acceptedSteps: number;
}

function describeStop(input: ExplanationInput, penaltyList: string): string {
  switch (input.stopReason) {
    case 'local_optimum':
      return `Selected because no single move or swap reduced the remaining penalties: ${penaltyList}.`;
    case 'iteration_budget':
      return (
        `Search stopped after ${input.evaluations} candidate evaluation(s) when the iteration budget ran out; ` +
        `the best itinerary found still carries: ${penaltyList}.`
      );
    case 'time_budget':
      return (
        `Search stopped after ${input.evaluations} candidate evaluation(s) when the time budget ran out; ` +
        `the best itinerary found still carries: ${penaltyList}.`
      );
  }
}

function listPenalties(report: ScoreReport): string {
  return report.penalties
    .map(p => `${p.message} (+${formatAmount(p.penalty)})`)
    .join('; ');
}

function infeasibleSentence(report: ScoreReport): string {
  return `Infeasible: ${report.violations.map(v => v.message).join('; ')}.`;
}

/**
 * 由 ScoreReport 的罚分列表直接推出的文字解释（顺序与 penalties 一致）
 */
export function buildExplanation(input: ExplanationInput): string {
  const { report } = input;
  const sentences: string[] = [];

  if (report.penalties.length === 0) {
    sentences.push(
      `Selected after ${input.evaluations} candidate evaluation(s): no penalties remain, ` +
        `so no move or swap could lower the score.`,
    );
  } else {
    sentences.push(describeStop(input, listPenalties(report)));
  }

  if (input.acceptedSteps > 0) {
    sentences.push(
      `Local search lowered the score from ${formatAmount(input.initialScore)} ` +
        `to ${formatAmount(report.totalScore)} in ${input.acceptedSteps} step(s).`,
    );
  }

  if (!report.feasible) {
    sentences.push(infeasibleSentence(report));
  }

  return sentences.join(' ');
}

export interface RainExplanationInput {
  report: ScoreReport;      // 雨天修复后重新评分的报告
  plannedScore: number;
  rainyDays: readonly number[];
  swaps: number;
  unresolved: number;
}

/**
 * 雨天修复后的解释：搜索结果已被对调改变，罚分以修复后的报告为准
 */
export function buildRainExplanation(input: RainExplanationInput): string {
  const { report } = input;
  const days = [...input.rainyDays].sort((a, b) => a - b).join(', ');

  let opening = `Rain on day(s) ${days}: ${input.swaps} outdoor spot(s) swapped with indoor spots from dry days`;
  if (input.unresolved > 0) {
    opening += `, ${input.unresolved} left outdoors`;
  }
  const sentences = [`${opening}.`];

  if (report.penalties.length === 0) {
    sentences.push('No penalties remain after the swaps.');
  } else {
    sentences.push(`After the swaps the itinerary carries: ${listPenalties(report)}.`);
  }

  if (report.totalScore !== input.plannedScore) {
    sentences.push(
      `The score changed from ${formatAmount(input.plannedScore)} to ${formatAmount(report.totalScore)}.`,
    );
  }

  if (!report.feasible) {
    sentences.push(infeasibleSentence(report));
  }

  return sentences.join(' ');
}
