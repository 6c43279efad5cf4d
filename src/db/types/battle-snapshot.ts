// 턴 단위 배틀 스냅샷: 공급자가 채워서 넘기는 읽기 전용 모델

import type {
  BoostStat,
  CoreStat,
  Effect,
  Field,
  MoveCategory,
  MoveFlag,
  PokemonType,
  SideCondition,
  Status,
  Weather,
} from './enums.js';

export type StatBlock = Record<CoreStat, number>;
export type BoostTable = Partial<Record<BoostStat, number>>;

export type MoveView = {
  id: string;
  basePower: number;
  type: PokemonType;
  category: MoveCategory;
  /** 0~100, true = 필중 */
  accuracy: number | true;
  priority: number;
  /** 급소 랭크 (0 = 기본, 1 = 급소율 높음) */
  critRatio: number;
  flags: MoveFlag[];
  boosts: BoostTable | null;
  recoil: number;
};

export type PokemonView = {
  species: string;
  hpFraction: number;
  stats: StatBlock;
  boosts: BoostTable;
  status: Status | null;
  /** 남은 수면 턴 등 */
  statusCounter: number;
  ability: string | null;
  possibleAbilities: string[];
  /** null = 없음, 'unknown_item' = 아직 공개되지 않음 */
  item: string | null;
  types: PokemonType[];
  effects: Effect[];
  mustRecharge: boolean;
  fainted: boolean;
  weightKg: number | null;
  revealedMoves: MoveView[];
  turnCount: number;
};

export type SideConditions = Partial<Record<SideCondition, number>>;

export type BattleSnapshot = {
  turn: number;
  generation: number;
  activeSelf: PokemonView;
  activeOpponent: PokemonView;
  teamSelf: Record<string, PokemonView>;
  teamOpponent: Record<string, PokemonView>;
  fieldConditions: Field[];
  weather: Weather | null;
  sideConditionsSelf: SideConditions;
  sideConditionsOpponent: SideConditions;
  availableMoves: MoveView[];
  availableSwitches: PokemonView[];
  forceSwitch: boolean;
};
