// 배틀 도메인 정본 Enums: 스냅샷 공급자와 공유하는 식별자

export const POKEMON_TYPE = [
  'NORMAL',
  'FIRE',
  'WATER',
  'ELECTRIC',
  'GRASS',
  'ICE',
  'FIGHTING',
  'POISON',
  'GROUND',
  'FLYING',
  'PSYCHIC',
  'BUG',
  'ROCK',
  'GHOST',
  'DRAGON',
  'DARK',
  'STEEL',
  'FAIRY',
] as const;
export type PokemonType = (typeof POKEMON_TYPE)[number];

export const MOVE_CATEGORY = ['PHYSICAL', 'SPECIAL', 'STATUS'] as const;
export type MoveCategory = (typeof MOVE_CATEGORY)[number];

export const STATUS = ['BRN', 'FRZ', 'PAR', 'PSN', 'SLP', 'TOX'] as const;
export type Status = (typeof STATUS)[number];

export const WEATHER = [
  'SUNNYDAY',
  'DESOLATELAND',
  'RAINDANCE',
  'PRIMORDIALSEA',
  'SANDSTORM',
  'HAIL',
  'SNOW',
  'SNOWSCAPE',
  'DELTASTREAM',
] as const;
export type Weather = (typeof WEATHER)[number];

export const FIELD = [
  'ELECTRIC_TERRAIN',
  'GRASSY_TERRAIN',
  'MISTY_TERRAIN',
  'PSYCHIC_TERRAIN',
  'TRICK_ROOM',
  'GRAVITY',
  'MAGIC_ROOM',
  'WONDER_ROOM',
] as const;
export type Field = (typeof FIELD)[number];

export const SIDE_CONDITION = [
  'STEALTH_ROCK',
  'SPIKES',
  'TOXIC_SPIKES',
  'STICKY_WEB',
  'REFLECT',
  'LIGHT_SCREEN',
  'AURORA_VEIL',
  'TAILWIND',
  'SAFEGUARD',
  'MIST',
] as const;
export type SideCondition = (typeof SIDE_CONDITION)[number];

export const EFFECT = [
  'TAUNT',
  'ENCORE',
  'LEECH_SEED',
  'SUBSTITUTE',
  'AQUA_RING',
  'INGRAIN',
  'FOCUS_ENERGY',
  'CONFUSION',
  'YAWN',
  'BIND',
  'CLAMP',
  'FIRE_SPIN',
  'INFESTATION',
  'SAND_TOMB',
  'SNAP_TRAP',
  'THUNDER_CAGE',
  'WHIRLPOOL',
  'WRAP',
] as const;
export type Effect = (typeof EFFECT)[number];

export const CORE_STAT = ['hp', 'atk', 'def', 'spa', 'spd', 'spe'] as const;
export type CoreStat = (typeof CORE_STAT)[number];

export const BOOST_STAT = [
  'atk',
  'def',
  'spa',
  'spd',
  'spe',
  'accuracy',
  'evasion',
] as const;
export type BoostStat = (typeof BOOST_STAT)[number];

export const MOVE_FLAG = [
  'contact',
  'sound',
  'punch',
  'bite',
  'pulse',
  'powder',
  'slicing',
  'wind',
  'bullet',
] as const;
export type MoveFlag = (typeof MOVE_FLAG)[number];

export const SIDE = ['SELF', 'OPPONENT'] as const;
export type Side = (typeof SIDE)[number];

export const DECISION_SOURCE = ['DECISION_MAKER', 'FALLBACK', 'FORCED'] as const;
export type DecisionSource = (typeof DECISION_SOURCE)[number];
