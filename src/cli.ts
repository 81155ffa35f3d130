// src/cli.ts

/**
 * 命令行参数解析与自检报告输出
 *
 * 用法：node dist/main.js <city> [days=3] [walk|transit|taxi] [rainyDay,...]
 */

import {
  buildRainExplanation,
  CatalogLoaderService,
  Itinerary,
  ItineraryPlannerService,
  PlanningRequest,
  Policy,
  ScoreReport,
  SpotCatalog,
  WeatherReplannerService,
} from './itinerary-planning';
import { formatAmount } from './itinerary-planning/scoring/soft-constraint-scorer.service';

export interface CliArgs {
  cityId: string;
  dayCount: number;
  policy: Policy;
  rainyDays: number[];
}

const PREFERENCE_TO_POLICY: ReadonlyMap<string, Policy> = new Map([
  ['walk', Policy.WALK],
  ['transit', Policy.TRANSIT],
  ['taxi', Policy.TAXI],
]);

export const USAGE = 'Usage: main <city> [days=3] [walk|transit|taxi] [rainyDay,...]';

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const [cityId, days = '3', preference = 'walk', rain] = argv;
  if (!cityId) {
    throw new Error(`Missing required parameter: 'city'. ${USAGE}`);
  }

  const dayCount = Number(days);
  if (!Number.isInteger(dayCount) || dayCount < 1) {
    throw new Error(`Invalid day count '${days}'. ${USAGE}`);
  }

  const policy = PREFERENCE_TO_POLICY.get(preference.toLowerCase());
  if (!policy) {
    throw new Error(`Invalid preference value '${preference}'. Must be one of: walk, transit, taxi`);
  }

  const rainyDays = rain
    ? rain.split(',').map(part => {
        const day = Number(part.trim());
        if (!Number.isInteger(day) || day < 1 || day > dayCount) {
          throw new Error(`Invalid rainy day '${part}': expected 1..${dayCount}`);
        }
        return day;
      })
    : [];

  return { cityId, dayCount, policy, rainyDays };
}

export function formatPlanReport(
  catalog: SpotCatalog,
  itinerary: Itinerary,
  report: ScoreReport,
): string[] {
  const lines = [`Best score: ${report.totalScore.toFixed(2)}`];

  for (const day of itinerary.days) {
    const names = day.spotIds.map(id => catalog.getSpot(id)?.name ?? id);
    lines.push(`Day ${day.day}: ${names.length > 0 ? names.join(' -> ') : '(free day)'}`);
  }

  if (report.penalties.length === 0) {
    lines.push('Self-check report: no penalties');
  } else {
    lines.push('Self-check report:');
    for (const p of report.penalties) {
      lines.push(` - ${p.message} (+${formatAmount(p.penalty)})`);
    }
  }

  if (!report.feasible) {
    lines.push('Infeasible:');
    for (const v of report.violations) {
      lines.push(` - ${v.message}`);
    }
  }

  return lines;
}

export interface PlanCommandServices {
  loader: Pick<CatalogLoaderService, 'loadCity'>;
  planner: ItineraryPlannerService;
  replanner: WeatherReplannerService;
}

/**
 * 加载目录 → 规划 → （可选）雨天修复并重新评分，返回要输出的各行
 */
export async function runPlanCommand(args: CliArgs, services: PlanCommandServices): Promise<string[]> {
  const catalog = await services.loader.loadCity(args.cityId);

  const request: PlanningRequest = {
    catalog,
    cityId: args.cityId,
    dayCount: args.dayCount,
    policy: args.policy,
  };
  const result = services.planner.plan(request);

  if (args.rainyDays.length === 0) {
    return [...formatPlanReport(catalog, result.itinerary, result.report), result.explanation];
  }

  const replanned = services.replanner.replanForRain(catalog, result.itinerary, args.rainyDays);
  const report = services.planner.score(services.planner.createContext(request), replanned.itinerary);

  const lines = replanned.swaps.map(
    swap => `Rain on day ${swap.rainyDay}: swapped ${swap.outdoorSpotId} with ${swap.indoorSpotId} (day ${swap.dryDay})`,
  );
  lines.push(...formatPlanReport(catalog, replanned.itinerary, report));
  lines.push(
    buildRainExplanation({
      report,
      plannedScore: result.report.totalScore,
      rainyDays: args.rainyDays,
      swaps: replanned.swaps.length,
      unresolved: replanned.unresolved.length,
    }),
  );
  return lines;
}
