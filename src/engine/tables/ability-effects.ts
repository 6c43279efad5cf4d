// 특성 효과표: 방어 특성 면역/배율, 공격 특성 위력 보정

import type {
  MoveCategory,
  MoveFlag,
  PokemonType,
  Status,
  Weather,
} from '../../db/types/index.js';

/** 특성 판정에 필요한 최소 문맥 (스냅샷에서 매 기술마다 구성) */
export interface AbilityMoveContext {
  moveId: string;
  moveType: PokemonType;
  category: MoveCategory;
  flags: readonly MoveFlag[];
  power: number;
  recoil: number;
  /** 순수 타입 상성 배율 (특성 적용 전) */
  rawEffectiveness: number;
}

export interface DefenderContext {
  hpFraction: number;
}

export interface AttackerContext {
  hpFraction: number;
  status: Status | null;
  weather: Weather | null;
  turn: number;
  lastActionTaken: string | null;
}

interface ModifierRule<C> {
  ability: string;
  applies: (move: AbilityMoveContext, ctx: C) => boolean;
  multiplier: number;
}

const SUN: readonly Weather[] = ['SUNNYDAY', 'DESOLATELAND'];

const DEFENSIVE_IMMUNITIES: Record<string, readonly PokemonType[]> = {
  dryskin: ['WATER'],
  flashfire: ['FIRE'],
  levitate: ['GROUND'],
  lightningrod: ['ELECTRIC'],
  motordrive: ['ELECTRIC'],
  voltabsorb: ['ELECTRIC'],
  sapsipper: ['GRASS'],
  stormdrain: ['WATER'],
  waterabsorb: ['WATER'],
};

const DEFENSIVE_MODIFIERS: ModifierRule<DefenderContext>[] = [
  { ability: 'filter', applies: (m) => m.rawEffectiveness > 1, multiplier: 0.75 },
  { ability: 'solidrock', applies: (m) => m.rawEffectiveness > 1, multiplier: 0.75 },
  { ability: 'prismarmor', applies: (m) => m.rawEffectiveness > 1, multiplier: 0.75 },
  { ability: 'fluffy', applies: (m) => m.flags.includes('contact'), multiplier: 0.5 },
  { ability: 'furcoat', applies: (m) => m.category === 'PHYSICAL', multiplier: 0.5 },
  { ability: 'heatproof', applies: (m) => m.moveType === 'FIRE', multiplier: 0.5 },
  { ability: 'icescales', applies: (m) => m.category === 'SPECIAL', multiplier: 0.5 },
  { ability: 'multiscale', applies: (_m, d) => d.hpFraction === 1, multiplier: 0.5 },
  { ability: 'punkrock', applies: (m) => m.flags.includes('sound'), multiplier: 0.5 },
  { ability: 'purifyingsalt', applies: (m) => m.moveType === 'GHOST', multiplier: 0.5 },
  {
    ability: 'thickfat',
    applies: (m) => m.moveType === 'FIRE' || m.moveType === 'ICE',
    multiplier: 0.5,
  },
  { ability: 'waterbubble', applies: (m) => m.moveType === 'FIRE', multiplier: 0.5 },
  // 피해 증가
  { ability: 'dryskin', applies: (m) => m.moveType === 'FIRE', multiplier: 1.25 },
  { ability: 'fluffy', applies: (m) => m.moveType === 'FIRE', multiplier: 2 },
];

const isPinch = (a: AttackerContext) => a.hpFraction <= 1 / 3;

const ATTACKER_POWER_BOOSTS: ModifierRule<AttackerContext>[] = [
  { ability: 'aerilate', applies: (m) => m.moveType === 'NORMAL', multiplier: 1.2 },
  {
    ability: 'analytic',
    applies: (m, a) => a.turn > 1 && a.lastActionTaken === m.moveId,
    multiplier: 1.3,
  },
  { ability: 'blaze', applies: (m, a) => isPinch(a) && m.moveType === 'FIRE', multiplier: 1.5 },
  { ability: 'darkaura', applies: () => true, multiplier: 1.33 },
  { ability: 'fairyaura', applies: () => true, multiplier: 1.33 },
  {
    ability: 'flareboost',
    applies: (m, a) => a.status === 'BRN' && m.category === 'SPECIAL',
    multiplier: 1.5,
  },
  {
    ability: 'guts',
    applies: (m, a) => a.status !== null && m.category === 'PHYSICAL',
    multiplier: 1.5,
  },
  { ability: 'ironfist', applies: (m) => m.flags.includes('punch'), multiplier: 1.2 },
  { ability: 'megalauncher', applies: (m) => m.flags.includes('pulse'), multiplier: 1.5 },
  { ability: 'overgrow', applies: (m, a) => isPinch(a) && m.moveType === 'GRASS', multiplier: 1.5 },
  { ability: 'pixilate', applies: (m) => m.moveType === 'NORMAL', multiplier: 1.2 },
  { ability: 'punkrock', applies: (m) => m.flags.includes('sound'), multiplier: 1.3 },
  { ability: 'reckless', applies: (m) => m.recoil > 0, multiplier: 1.2 },
  { ability: 'refrigerate', applies: (m) => m.moveType === 'NORMAL', multiplier: 1.2 },
  {
    ability: 'sandforce',
    applies: (m, a) =>
      a.weather === 'SANDSTORM' &&
      (m.moveType === 'ROCK' || m.moveType === 'GROUND' || m.moveType === 'STEEL'),
    multiplier: 1.3,
  },
  {
    ability: 'solarpower',
    applies: (m, a) =>
      a.weather !== null && SUN.includes(a.weather) && m.category === 'SPECIAL',
    multiplier: 1.5,
  },
  { ability: 'steelworker', applies: (m) => m.moveType === 'STEEL', multiplier: 1.5 },
  { ability: 'steelyspirit', applies: (m) => m.moveType === 'STEEL', multiplier: 1.5 },
  { ability: 'strongjaw', applies: (m) => m.flags.includes('bite'), multiplier: 1.5 },
  { ability: 'swarm', applies: (m, a) => isPinch(a) && m.moveType === 'BUG', multiplier: 1.5 },
  { ability: 'technician', applies: (m) => m.power <= 60, multiplier: 1.5 },
  { ability: 'torrent', applies: (m, a) => isPinch(a) && m.moveType === 'WATER', multiplier: 1.5 },
  { ability: 'toughclaws', applies: (m) => m.flags.includes('contact'), multiplier: 1.3 },
  {
    ability: 'toxicboost',
    applies: (m, a) =>
      (a.status === 'PSN' || a.status === 'TOX') && m.category === 'PHYSICAL',
    multiplier: 1.5,
  },
  { ability: 'transistor', applies: (m) => m.moveType === 'ELECTRIC', multiplier: 1.3 },
  { ability: 'waterbubble', applies: (m) => m.moveType === 'WATER', multiplier: 2 },
];

/**
 * 방어 특성 배율.
 * 면역(0)이 먼저 판정되고, 면역이 아닐 때만 곱연산 보정을 적용한다.
 */
export function defensiveModifier(
  ability: string,
  move: AbilityMoveContext,
  defender: DefenderContext,
): number {
  if (DEFENSIVE_IMMUNITIES[ability]?.includes(move.moveType)) return 0;

  return DEFENSIVE_MODIFIERS.filter(
    (r) => r.ability === ability && r.applies(move, defender),
  ).reduce((acc, r) => acc * r.multiplier, 1);
}

/**
 * 특성 미공개 시 최악(가장 피해가 적은) 경우 배율.
 * 초기값 1.0: 모르는 특성이 피해를 늘린다고 가정하지 않는다.
 */
export function worstCaseDefensiveModifier(
  possibleAbilities: readonly string[],
  move: AbilityMoveContext,
  defender: DefenderContext,
): number {
  return possibleAbilities.reduce(
    (worst, ability) => Math.min(worst, defensiveModifier(ability, move, defender)),
    1,
  );
}

/** 공격 특성 위력 보정: 특성 하나당 최대 한 규칙 */
export function attackerPowerModifier(
  ability: string | null,
  move: AbilityMoveContext,
  attacker: AttackerContext,
): number {
  if (!ability) return 1;
  const rule = ATTACKER_POWER_BOOSTS.find(
    (r) => r.ability === ability && r.applies(move, attacker),
  );
  return rule?.multiplier ?? 1;
}
