// 필터 규칙이 참조하는 기술 분류표

import type { BoostStat, Effect, SideCondition } from '../../db/types/index.js';

export const HEALING_MOVES = [
  'healorder',
  'milkdrink',
  'moonlight',
  'morningsun',
  'recover',
  'rest',
  'roost',
  'shoreup',
  'slackoff',
  'softboiled',
  'swallow',
  'synthesis',
] as const;

export const SUN_HEALING_MOVES = ['synthesis', 'moonlight', 'morningsun'] as const;

export const SLEEP_MOVES = [
  'darkvoid',
  'grasswhistle',
  'hypnosis',
  'lovelykiss',
  'sing',
  'sleeppowder',
  'spore',
  'yawn',
] as const;

export const STATUS_INFLICTING_MOVES = [
  'glare',
  'poisonpowder',
  'poisongas',
  'stunspore',
  'thunderwave',
  'toxic',
  'willowisp',
  ...SLEEP_MOVES,
] as const;

export const POWDER_MOVES = ['poisonpowder', 'sleeppowder', 'spore', 'stunspore'] as const;
export const PARALYSIS_MOVES = ['thunderwave', 'glare', 'nuzzle'] as const;
export const POISON_MOVES = ['toxic', 'poisonpowder', 'poisongas'] as const;

export const HAZARD_CONDITIONS: readonly SideCondition[] = [
  'STEALTH_ROCK',
  'SPIKES',
  'TOXIC_SPIKES',
  'STICKY_WEB',
];

export const HAZARD_REMOVERS = ['rapidspin', 'mortalspin'] as const;

export const TRAPPING_EFFECTS: readonly Effect[] = [
  'BIND',
  'CLAMP',
  'FIRE_SPIN',
  'INFESTATION',
  'SAND_TOMB',
  'SNAP_TRAP',
  'THUNDER_CAGE',
  'WHIRLPOOL',
  'WRAP',
];

export const TRAPPING_MOVES = [
  'bind',
  'clamp',
  'firespin',
  'infestation',
  'sandtomb',
  'snaptrap',
  'thundercage',
  'whirlpool',
  'wrap',
] as const;

/** 상대에게 걸린 상태면 다시 쓸 필요가 없는 기술 */
export const OPPONENT_VOLATILE_MOVES: Record<string, Effect> = {
  taunt: 'TAUNT',
  encore: 'ENCORE',
  leechseed: 'LEECH_SEED',
};

/** 자신에게 이미 걸려 있으면 다시 쓸 필요가 없는 기술 */
export const SELF_VOLATILE_MOVES: Record<string, Effect> = {
  aquaring: 'AQUA_RING',
  ingrain: 'INGRAIN',
  focusenergy: 'FOCUS_ENERGY',
};

export const WAKE_UP_MOVES = ['sleeptalk', 'snore'] as const;

export const ITEM_SWAP_MOVES = ['trick', 'switcheroo'] as const;

export const PROTECT_MOVES = [
  'protect',
  'detect',
  'spikyshield',
  'kingsshield',
  'banefulbunker',
  'obstruct',
  'burningbulwark',
  'silktrap',
] as const;

/** 직전 턴에 썼다면 이번 턴엔 가치가 없는 기술 */
export const ONCE_PER_CYCLE_MOVES = ['wish', 'trickroom', 'yawn'] as const;

export const PIVOT_MOVES = [
  'batonpass',
  'teleport',
  'flipturn',
  'voltswitch',
  'uturn',
  'partingshot',
] as const;

export const RECHARGE_MOVES = [
  'hyperbeam',
  'gigaimpact',
  'rockwrecker',
  'frenzyplant',
  'blastburn',
  'hydrocannon',
  'roaroftime',
  'eternabeam',
] as const;

export const SELF_KO_MOVES = ['explosion', 'selfdestruct', 'mistyexplosion'] as const;

export const CLERIC_MOVES = ['healbell', 'aromatherapy'] as const;

export const SPECIAL_WALLS = ['blissey', 'chansey'] as const;

/** 자기 진영 설치 기술 → 이미 깔려 있는지 확인할 조건 */
export const SELF_SIDE_SETUP: Record<string, SideCondition> = {
  reflect: 'REFLECT',
  lightscreen: 'LIGHT_SCREEN',
  auroraveil: 'AURORA_VEIL',
  tailwind: 'TAILWIND',
};

/** 상대 진영 설치 기술 → (조건, 최대 중첩) */
export const OPPONENT_SIDE_HAZARDS: Record<string, { condition: SideCondition; cap: number }> = {
  stealthrock: { condition: 'STEALTH_ROCK', cap: 1 },
  spikes: { condition: 'SPIKES', cap: 3 },
  toxicspikes: { condition: 'TOXIC_SPIKES', cap: 2 },
  stickyweb: { condition: 'STICKY_WEB', cap: 1 },
};

type BoostLevels = Partial<Record<BoostStat, number>>;

/**
 * 랭크업 기술 포화 판정. 모든 스탯이 임계 이상이면 제거.
 * shellsmash 는 공격/특공 중 하나만 차 있어도 된다.
 */
export const SETUP_SATURATION: Record<string, (boosts: BoostLevels) => boolean> = {
  swordsdance: (b) => (b.atk ?? 0) >= 2,
  nastyplot: (b) => (b.spa ?? 0) >= 2,
  irondefense: (b) => (b.def ?? 0) >= 2,
  acidarmor: (b) => (b.def ?? 0) >= 2,
  amnesia: (b) => (b.spd ?? 0) >= 2,
  agility: (b) => (b.spe ?? 0) >= 2,
  rockpolish: (b) => (b.spe ?? 0) >= 2,
  bulkup: (b) => (b.atk ?? 0) >= 1 && (b.def ?? 0) >= 1,
  coil: (b) => (b.atk ?? 0) >= 1 && (b.def ?? 0) >= 1,
  dragondance: (b) => (b.atk ?? 0) >= 1 && (b.spe ?? 0) >= 1,
  calmmind: (b) => (b.spa ?? 0) >= 1 && (b.spd ?? 0) >= 1,
  quiverdance: (b) => (b.spa ?? 0) >= 1 && (b.spd ?? 0) >= 1 && (b.spe ?? 0) >= 1,
  shellsmash: (b) => ((b.atk ?? 0) >= 2 || (b.spa ?? 0) >= 2) && (b.spe ?? 0) >= 2,
};

export const MAX_STAGE = 6;

export function includesMove(list: readonly string[], moveId: string): boolean {
  return list.includes(moveId);
}
