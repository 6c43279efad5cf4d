// 필드/날씨/설치기 관련 제거 규칙

import type { SideConditions, Weather } from '../../../db/types/index.js';
import {
  HAZARD_CONDITIONS,
  HAZARD_REMOVERS,
  OPPONENT_SIDE_HAZARDS,
  SELF_SIDE_SETUP,
  SUN_HEALING_MOVES,
} from '../../tables/move-lists.js';
import type { FilterRule } from '../filter.types.js';
import { KEEP, hasMove, removeMoves } from './rule-helpers.js';

const SUN: readonly Weather[] = ['SUNNYDAY', 'DESOLATELAND'];
const RAIN: readonly Weather[] = ['RAINDANCE', 'PRIMORDIALSEA'];
const SNOW: readonly Weather[] = ['HAIL', 'SNOW', 'SNOWSCAPE'];
/** 아침햇살류 회복량이 줄어드는 날씨 */
const HEAL_REDUCING: readonly Weather[] = [
  'RAINDANCE',
  'PRIMORDIALSEA',
  'DELTASTREAM',
  'HAIL',
  'SANDSTORM',
  'SNOW',
  'SNOWSCAPE',
];

const active = (conditions: SideConditions, key: keyof SideConditions): boolean =>
  (conditions[key] ?? 0) > 0;

const inWeather = (weather: Weather | null, set: readonly Weather[]): boolean =>
  weather !== null && set.includes(weather);

export const saturatedFieldRule: FilterRule = {
  name: 'saturated-field',
  apply(candidates, ctx) {
    const { sideConditionsOpponent, sideConditionsSelf, fieldConditions } = ctx.snapshot;
    const saturated: string[] = [];

    for (const [moveId, hazard] of Object.entries(OPPONENT_SIDE_HAZARDS)) {
      if ((sideConditionsOpponent[hazard.condition] ?? 0) >= hazard.cap) saturated.push(moveId);
    }
    for (const [moveId, condition] of Object.entries(SELF_SIDE_SETUP)) {
      if (active(sideConditionsSelf, condition)) saturated.push(moveId);
    }
    if (fieldConditions.includes('TRICK_ROOM')) saturated.push('trickroom');

    return removeMoves(candidates, saturated, 'already active or at max stacks');
  },
};

export const uselessHazardRemovalRule: FilterRule = {
  name: 'useless-hazard-removal',
  apply(candidates, ctx) {
    const { sideConditionsSelf, sideConditionsOpponent } = ctx.snapshot;
    if (HAZARD_CONDITIONS.some((c) => active(sideConditionsSelf, c))) return KEEP;

    const useless: string[] = [...HAZARD_REMOVERS];
    const opponentClear = Object.values(sideConditionsOpponent).every((n) => !n);
    if (opponentClear && hasMove(candidates, 'defog')) useless.push('defog');

    return removeMoves(candidates, useless, 'no hazards to clear');
  },
};

export const weatherDependentRule: FilterRule = {
  name: 'weather-dependent',
  apply(candidates, ctx) {
    const weather = ctx.snapshot.weather;
    const useless: string[] = [];

    if (!inWeather(weather, SUN)) useless.push('solarbeam', 'solarblade');
    if (!inWeather(weather, RAIN)) useless.push('electroshot');
    if (!inWeather(weather, SNOW)) useless.push('auroraveil');
    if (inWeather(weather, HEAL_REDUCING)) useless.push(...SUN_HEALING_MOVES);
    if (weather === null) useless.push('weatherball');

    return removeMoves(candidates, useless, `weather is ${weather ?? 'none'}`);
  },
};
