// src/itinerary-planning/geometry/world-geometry.ts

/**
 * World Geometry - 离线旅行时间估算
 *
 * 使用固定速度 + 每段固定开销，不调用在线路线服务：
 * 规划内循环必须可复现、不依赖网络。
 */

import { GeoPoint, Policy, Spot } from '../world-model';

export interface PolicyProfile {
  policy: Policy;
  speedKmh: number;
  overheadMin: number; // 每段固定开销（等车、叫车）
  description: string;
}

export const POLICY_PROFILES: Record<Policy, PolicyProfile> = {
  [Policy.WALK]: {
    policy: Policy.WALK,
    speedKmh: 5,
    overheadMin: 0,
    description: '步行',
  },
  [Policy.TRANSIT]: {
    policy: Policy.TRANSIT,
    speedKmh: 30, // 包含换乘
    overheadMin: 10,
    description: '公共交通',
  },
  [Policy.TAXI]: {
    policy: Policy.TAXI,
    speedKmh: 25, // 考虑堵车
    overheadMin: 5,
    description: '打车',
  },
};

export interface TravelLeg {
  policy: Policy;
  durationMin: number;
  distanceKm: number;
}

const EARTH_RADIUS_KM = 6371;

function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * 两点间距离（公里），Haversine 公式
 */
export function distanceKm(a: GeoPoint, b: GeoPoint): number {
  if (a.lat === b.lat && a.lng === b.lng) {
    return 0;
  }

  const dLat = toRadians(b.lat - a.lat);
  const dLng = toRadians(b.lng - a.lng);

  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(a.lat)) *
      Math.cos(toRadians(b.lat)) *
      Math.sin(dLng / 2) *
      Math.sin(dLng / 2);

  return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

function minutesAt(km: number, profile: PolicyProfile): number {
  return Math.round((km / profile.speedKmh) * 60 + profile.overheadMin);
}

/**
 * 单段旅行时间（分钟）
 *
 * 非步行策略的一段不会比步行更慢：短距离直接步行。
 */
export function travelTime(from: Spot, to: Spot, policy: Policy): number {
  const km = distanceKm(from.location, to.location);
  if (km === 0) {
    return 0;
  }

  const walkMin = minutesAt(km, POLICY_PROFILES[Policy.WALK]);
  if (policy === Policy.WALK) {
    return walkMin;
  }

  return Math.min(walkMin, minutesAt(km, POLICY_PROFILES[policy]));
}

export function travelLeg(from: Spot, to: Spot, policy: Policy): TravelLeg {
  return {
    policy,
    durationMin: travelTime(from, to, policy),
    distanceKm: distanceKm(from.location, to.location),
  };
}

/**
 * 一天内相邻访问点之间的旅行时间之和；空日或单点日为 0
 */
export function dayTravelTime(day: readonly Spot[], policy: Policy): number {
  let total = 0;
  for (let i = 1; i < day.length; i++) {
    total += travelTime(day[i - 1], day[i], policy);
  }
  return total;
}

export function dayDistanceKm(day: readonly Spot[]): number {
  let total = 0;
  for (let i = 1; i < day.length; i++) {
    total += distanceKm(day[i - 1].location, day[i].location);
  }
  return total;
}
