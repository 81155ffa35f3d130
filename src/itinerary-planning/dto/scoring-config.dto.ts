// src/itinerary-planning/dto/scoring-config.dto.ts

import { BadRequestException } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { IsInt, IsNumber, Matches, Min, validateSync } from 'class-validator';
import { ISOTime, Policy } from '../world-model';

/**
 * Soft Constraint Scorer 配置
 */
export interface ScoringConfig {
  maxDailyTravelTime: number;   // 分钟，超出部分按 travelTimeWeight 计罚
  minSpotsPerDay: number;
  maxSpotsPerDay: number;
  spotDurationWeight: number;   // 每缺少/多出一个 spot 的罚分
  travelTimeWeight: number;     // 每超出一分钟的罚分
  closedSpotPenalty: number;    // 在开放时间外到访的罚分（硬约束）
  dayStartTime: ISOTime;
}

/**
 * 每日旅行时间上限默认值（分钟），按交通策略区分
 */
export const DEFAULT_MAX_DAILY_TRAVEL_TIME: Record<Policy, number> = {
  [Policy.WALK]: 240,
  [Policy.TRANSIT]: 300,
  [Policy.TAXI]: 360,
};

export const DEFAULT_SCORING_CONFIG: Omit<ScoringConfig, 'maxDailyTravelTime'> = {
  minSpotsPerDay: 2,
  maxSpotsPerDay: 5,
  spotDurationWeight: 15,
  travelTimeWeight: 1.5,
  closedSpotPenalty: 500,
  dayStartTime: '09:00',
};

export class ScoringConfigDto implements ScoringConfig {
  @IsNumber()
  @Min(0)
  maxDailyTravelTime!: number;

  @IsInt()
  @Min(0)
  minSpotsPerDay!: number;

  @IsInt()
  @Min(1)
  maxSpotsPerDay!: number;

  @IsNumber()
  @Min(0)
  spotDurationWeight!: number;

  @IsNumber()
  @Min(0)
  travelTimeWeight!: number;

  @IsNumber()
  @Min(0)
  closedSpotPenalty!: number;

  @Matches(/^([01]\d|2[0-3]):[0-5]\d$/, { message: 'dayStartTime must be HH:mm' })
  dayStartTime!: ISOTime;
}

/**
 * 合并默认值并校验；配置错误在规划开始前抛出
 */
export function resolveScoringConfig(
  overrides: Partial<ScoringConfig> | undefined,
  policy: Policy,
): ScoringConfig {
  const merged: ScoringConfig = {
    maxDailyTravelTime: overrides?.maxDailyTravelTime ?? DEFAULT_MAX_DAILY_TRAVEL_TIME[policy],
    minSpotsPerDay: overrides?.minSpotsPerDay ?? DEFAULT_SCORING_CONFIG.minSpotsPerDay,
    maxSpotsPerDay: overrides?.maxSpotsPerDay ?? DEFAULT_SCORING_CONFIG.maxSpotsPerDay,
    spotDurationWeight: overrides?.spotDurationWeight ?? DEFAULT_SCORING_CONFIG.spotDurationWeight,
    travelTimeWeight: overrides?.travelTimeWeight ?? DEFAULT_SCORING_CONFIG.travelTimeWeight,
    closedSpotPenalty: overrides?.closedSpotPenalty ?? DEFAULT_SCORING_CONFIG.closedSpotPenalty,
    dayStartTime: overrides?.dayStartTime ?? DEFAULT_SCORING_CONFIG.dayStartTime,
  };

  const dto = plainToInstance(ScoringConfigDto, merged);
  const messages = validateSync(dto).flatMap(error =>
    Object.values(error.constraints ?? {}),
  );

  if (messages.length === 0 && merged.minSpotsPerDay > merged.maxSpotsPerDay) {
    messages.push(
      `minSpotsPerDay (${merged.minSpotsPerDay}) must not exceed maxSpotsPerDay (${merged.maxSpotsPerDay})`,
    );
  }

  if (messages.length > 0) {
    throw new BadRequestException(`Invalid scoring configuration: ${messages.join('; ')}`);
  }

  return merged;
}
