// src/itinerary-planning/planner/itinerary-planner.service.ts

/**
 * Itinerary Planner Service
 *
 * 状态机：Construct → Improve（first-improvement 爬山）→ Done
 * 单线程、同步；预算只在两次候选评估之间检查。
 */

import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SpotCatalog } from '../catalog/spot-catalog';
import { resolveScoringConfig, ScoringConfig } from '../dto/scoring-config.dto';
import { SoftConstraintScorer } from '../scoring/soft-constraint-scorer.service';
import { ScoreReport } from '../scoring/score-report';
import { ALL_POLICIES, Itinerary, Policy, Spot } from '../world-model';
import { constructItinerary } from './construction';
import { buildExplanation, StopReason } from './explanation';
import { assertExclusiveAssignment, assignedSpotIds, cloneItinerary } from './itinerary-ops.util';
import {
  applyOperator,
  describeOperator,
  enumerateNeighborhood,
  NeighborOperator,
} from './neighborhood';

export const DEFAULT_MAX_ITERATIONS = 20000;
export const DEFAULT_TIME_BUDGET_MS = 2000;

export interface SearchBudget {
  maxIterations?: number;    // 候选评估次数上限
  timeBudgetMs?: number;
  now?: () => number;        // 测试可注入时钟
}

export interface PlanningRequest {
  catalog: SpotCatalog;
  cityId: string;
  dayCount: number;
  policy: Policy;
  scoring?: Partial<ScoringConfig>;
  budget?: SearchBudget;
}

/**
 * 一次规划运行的只读上下文
 */
export interface PlanningContext {
  catalog: SpotCatalog;
  cityId: string;
  dayCount: number;
  policy: Policy;
  config: ScoringConfig;
  spots: Spot[];
}

interface ResolvedBudget {
  maxIterations: number;
  timeBudgetMs: number;
  now: () => number;
}

export interface AcceptedStep {
  operator: NeighborOperator;
  description: string;
  totalScore: number;
}

export interface ImproveOutcome {
  itinerary: Itinerary;
  report: ScoreReport;
  stopReason: StopReason;
  evaluations: number;
  passes: number;
  acceptedSteps: AcceptedStep[];
  scoreTrace: number[];       // 种子分数 + 每次接受后的分数，单调不增
}

export interface PlanResult {
  itinerary: Itinerary;
  report: ScoreReport;
  initialItinerary: Itinerary;
  initialReport: ScoreReport;
  explanation: string;
  stats: Omit<ImproveOutcome, 'itinerary' | 'report'>;
}

// 严格更优的判定阈值，避免浮点误差导致来回震荡
const IMPROVEMENT_EPSILON = 1e-9;

@Injectable()
export class ItineraryPlannerService {
  private readonly logger = new Logger(ItineraryPlannerService.name);

  constructor(
    private readonly scorer: SoftConstraintScorer,
    private readonly configService: ConfigService,
  ) {}

  /**
   * 完整运行：校验 → 构造 → 改进 → 解释
   */
  plan(request: PlanningRequest): PlanResult {
    const context = this.createContext(request);
    const budget = this.resolveBudget(request.budget);

    const initialItinerary = this.construct(context);
    const initialReport = this.score(context, initialItinerary);
    if (!initialReport.feasible) {
      this.logger.warn(
        `Initial itinerary for ${context.cityId} is infeasible: ` +
          initialReport.violations.map(v => v.code).join(', '),
      );
    }

    const outcome = this.runImprove(context, initialItinerary, initialReport, budget);
    const explanation = buildExplanation({
      report: outcome.report,
      initialScore: initialReport.totalScore,
      stopReason: outcome.stopReason,
      evaluations: outcome.evaluations,
      acceptedSteps: outcome.acceptedSteps.length,
    });

    this.logger.log(
      `Planned ${context.spots.length} spot(s) over ${context.dayCount} day(s) in ${context.cityId} ` +
        `(${context.policy}): score ${initialReport.totalScore} -> ${outcome.report.totalScore}, ` +
        `${outcome.evaluations} evaluation(s), stop=${outcome.stopReason}`,
    );

    const { itinerary, report, ...stats } = outcome;
    return {
      itinerary: cloneItinerary(itinerary),
      report,
      initialItinerary: cloneItinerary(initialItinerary),
      initialReport,
      explanation,
      stats,
    };
  }

  /**
   * 配置错误在此处抛出，规划尚未开始
   */
  createContext(request: PlanningRequest): PlanningContext {
    if (!ALL_POLICIES.includes(request.policy)) {
      throw new BadRequestException(
        `Unknown policy "${request.policy}"; expected one of ${ALL_POLICIES.join(', ')}`,
      );
    }
    if (!Number.isInteger(request.dayCount) || request.dayCount < 1) {
      throw new BadRequestException(`dayCount must be a positive integer, got ${request.dayCount}`);
    }

    const config = resolveScoringConfig(request.scoring, request.policy);

    if (!request.catalog.getCity(request.cityId)) {
      throw new NotFoundException(`City "${request.cityId}" not found in catalog`);
    }

    const seen = new Set<string>();
    const spots = request.catalog.listSpotsByCity(request.cityId).filter(spot => {
      if (seen.has(spot.id)) return false;
      seen.add(spot.id);
      return true;
    });

    return {
      catalog: request.catalog,
      cityId: request.cityId,
      dayCount: request.dayCount,
      policy: request.policy,
      config,
      spots,
    };
  }

  construct(context: PlanningContext): Itinerary {
    const itinerary = constructItinerary(context.cityId, context.spots, context.dayCount);
    assertExclusiveAssignment(itinerary, new Set(context.spots.map(s => s.id)), 'construction');
    return itinerary;
  }

  score(context: PlanningContext, itinerary: Itinerary): ScoreReport {
    return this.scorer.score(context.catalog, itinerary, context.policy, context.config);
  }

  /**
   * 从任意结构合法的种子开始改进（可用于从编辑后的状态重新规划）
   */
  improve(context: PlanningContext, seed: Itinerary, budget?: SearchBudget): ImproveOutcome {
    const resolved = this.resolveBudget(budget);

    if (seed.days.length !== context.dayCount) {
      throw new BadRequestException(
        `Seed itinerary has ${seed.days.length} day(s), expected ${context.dayCount}`,
      );
    }
    const validation = context.catalog.validate(seed);
    if (!validation.feasible) {
      throw new BadRequestException(
        `Seed itinerary is structurally invalid: ${validation.violations.map(v => v.message).join('; ')}`,
      );
    }

    const start = cloneItinerary(seed);
    return this.runImprove(context, start, this.score(context, start), resolved);
  }

  private runImprove(
    context: PlanningContext,
    seed: Itinerary,
    seedReport: ScoreReport,
    budget: ResolvedBudget,
  ): ImproveOutcome {
    const expected = new Set(assignedSpotIds(seed));
    const startedAt = budget.now();

    let current = seed;
    let currentReport = seedReport;
    const acceptedSteps: AcceptedStep[] = [];
    const scoreTrace = [seedReport.totalScore];
    let evaluations = 0;
    let passes = 0;
    let stopReason: StopReason | undefined;

    this.logger.debug(`Improve from seed score ${seedReport.totalScore}`);

    while (stopReason === undefined) {
      passes++;
      let accepted = false;

      for (const op of enumerateNeighborhood(current)) {
        if (evaluations >= budget.maxIterations) {
          stopReason = 'iteration_budget';
          break;
        }
        if (budget.now() - startedAt >= budget.timeBudgetMs) {
          stopReason = 'time_budget';
          break;
        }

        const candidate = applyOperator(current, op);
        assertExclusiveAssignment(candidate, expected, op.type);

        const report = this.score(context, candidate);
        evaluations++;

        if (report.totalScore < currentReport.totalScore - IMPROVEMENT_EPSILON) {
          const description = describeOperator(current, op);
          acceptedSteps.push({ operator: op, description, totalScore: report.totalScore });
          scoreTrace.push(report.totalScore);
          this.logger.debug(`Accepted ${description}: ${currentReport.totalScore} -> ${report.totalScore}`);

          current = candidate;
          currentReport = report;
          accepted = true;
          break;
        }
      }

      if (stopReason === undefined && !accepted) {
        stopReason = 'local_optimum';
      }
    }

    if (stopReason !== 'local_optimum') {
      this.logger.warn(
        `Search for ${context.cityId} stopped by ${stopReason} after ${evaluations} evaluation(s)`,
      );
    }

    return {
      itinerary: current,
      report: currentReport,
      stopReason,
      evaluations,
      passes,
      acceptedSteps,
      scoreTrace,
    };
  }

  private resolveBudget(budget?: SearchBudget): ResolvedBudget {
    const maxIterations =
      budget?.maxIterations ?? this.readPositiveSetting('PLANNER_MAX_ITERATIONS', DEFAULT_MAX_ITERATIONS);
    const timeBudgetMs =
      budget?.timeBudgetMs ?? this.readPositiveSetting('PLANNER_TIME_BUDGET_MS', DEFAULT_TIME_BUDGET_MS);

    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new BadRequestException(`maxIterations must be a positive integer, got ${maxIterations}`);
    }
    if (!(timeBudgetMs > 0)) {
      throw new BadRequestException(`timeBudgetMs must be positive, got ${timeBudgetMs}`);
    }

    return { maxIterations, timeBudgetMs, now: budget?.now ?? Date.now };
  }

  private readPositiveSetting(key: string, fallback: number): number {
    const raw = this.configService.get<string>(key);
    if (raw === undefined || raw === '') return fallback;

    // 先取整再判断，'0.5' 视为无效
    const value = Math.floor(Number(raw));
    if (!Number.isFinite(value) || value <= 0) {
      this.logger.warn(`Ignoring invalid ${key}="${raw}", using ${fallback}`);
      return fallback;
    }
    return value;
  }
}
