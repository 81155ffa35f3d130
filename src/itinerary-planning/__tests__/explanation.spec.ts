// src/itinerary-planning/__tests__/explanation.spec.ts

import { buildExplanation, buildRainExplanation } from '../planner/explanation';
import { ScoreReport } from '../scoring/score-report';

function reportWith(partial: Partial<ScoreReport>): ScoreReport {
  return { totalScore: 0, feasible: true, penalties: [], violations: [], days: [], ...partial };
}

const travelOverage = reportWith({
  totalScore: 22.5,
  penalties: [
    { day: 2, kind: 'travel', amount: 15, penalty: 22.5, message: 'Day 2 exceeds travel-time budget by 15 minutes' },
  ],
});

describe('buildExplanation', () => {
  it('should state that nothing is left to improve when no penalties remain', () => {
    expect(
      buildExplanation({
        report: reportWith({}),
        initialScore: 0,
        stopReason: 'local_optimum',
        evaluations: 39,
        acceptedSteps: 0,
      }),
    ).toBe('Selected after 39 candidate evaluation(s): no penalties remain, so no move or swap could lower the score.');
  });

  it('should cite the remaining penalties at a local optimum and the improvement made', () => {
    expect(
      buildExplanation({
        report: travelOverage,
        initialScore: 67.5,
        stopReason: 'local_optimum',
        evaluations: 120,
        acceptedSteps: 2,
      }),
    ).toBe(
      'Selected because no single move or swap reduced the remaining penalties: ' +
        'Day 2 exceeds travel-time budget by 15 minutes (+22.5). ' +
        'Local search lowered the score from 67.5 to 22.5 in 2 step(s).',
    );
  });

  it('should say which budget stopped the search', () => {
    expect(
      buildExplanation({
        report: travelOverage,
        initialScore: 22.5,
        stopReason: 'iteration_budget',
        evaluations: 5,
        acceptedSteps: 0,
      }),
    ).toBe(
      'Search stopped after 5 candidate evaluation(s) when the iteration budget ran out; ' +
        'the best itinerary found still carries: Day 2 exceeds travel-time budget by 15 minutes (+22.5).',
    );
    expect(
      buildExplanation({
        report: travelOverage,
        initialScore: 22.5,
        stopReason: 'time_budget',
        evaluations: 3,
        acceptedSteps: 0,
      }),
    ).toContain('when the time budget ran out');
  });

  it('should append hard violations when the itinerary is infeasible', () => {
    const report = reportWith({
      totalScore: 30,
      feasible: false,
      penalties: [
        { day: 1, kind: 'underfill', amount: 2, penalty: 30, message: 'Day 1 has 0 spot(s), below the minimum of 2' },
      ],
      violations: [
        { code: 'INSUFFICIENT_SPOTS', message: 'Only 0 spot(s) for 1 day(s); 2 are needed to meet the minimum of 2 per day' },
      ],
    });

    expect(
      buildExplanation({ report, initialScore: 30, stopReason: 'local_optimum', evaluations: 0, acceptedSteps: 0 }),
    ).toBe(
      'Selected because no single move or swap reduced the remaining penalties: ' +
        'Day 1 has 0 spot(s), below the minimum of 2 (+30). ' +
        'Infeasible: Only 0 spot(s) for 1 day(s); 2 are needed to meet the minimum of 2 per day.',
    );
  });
});

describe('buildRainExplanation', () => {
  it('should cite the penalties of the repaired itinerary and the score change', () => {
    expect(
      buildRainExplanation({
        report: travelOverage,
        plannedScore: 0,
        rainyDays: [3, 1],
        swaps: 2,
        unresolved: 1,
      }),
    ).toBe(
      'Rain on day(s) 1, 3: 2 outdoor spot(s) swapped with indoor spots from dry days, 1 left outdoors. ' +
        'After the swaps the itinerary carries: Day 2 exceeds travel-time budget by 15 minutes (+22.5). ' +
        'The score changed from 0 to 22.5.',
    );
  });

  it('should say when the swaps leave no penalties', () => {
    expect(
      buildRainExplanation({ report: reportWith({}), plannedScore: 0, rainyDays: [2], swaps: 0, unresolved: 0 }),
    ).toBe('Rain on day(s) 2: 0 outdoor spot(s) swapped with indoor spots from dry days. No penalties remain after the swaps.');
  });
});
