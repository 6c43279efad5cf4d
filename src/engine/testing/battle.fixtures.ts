// 테스트 공용 스냅샷 빌더

import type {
  BattleSnapshot,
  MoveView,
  PokemonView,
} from '../../db/types/index.js';
import { TypeChartService } from '../tables/type-chart.service.js';

export function makeMove(overrides: Partial<MoveView> = {}): MoveView {
  return {
    id: 'tackle',
    basePower: 40,
    type: 'NORMAL',
    category: 'PHYSICAL',
    accuracy: 100,
    priority: 0,
    critRatio: 0,
    flags: [],
    boosts: null,
    recoil: 0,
    ...overrides,
  };
}

export function makeStatusMove(id: string, overrides: Partial<MoveView> = {}): MoveView {
  return makeMove({
    id,
    basePower: 0,
    category: 'STATUS',
    accuracy: true,
    ...overrides,
  });
}

export function makePokemon(overrides: Partial<PokemonView> = {}): PokemonView {
  return {
    species: 'eevee',
    hpFraction: 1,
    stats: { hp: 100, atk: 100, def: 100, spa: 100, spd: 100, spe: 100 },
    boosts: {},
    status: null,
    statusCounter: 0,
    ability: null,
    possibleAbilities: [],
    item: null,
    types: ['NORMAL'],
    effects: [],
    mustRecharge: false,
    fainted: false,
    weightKg: null,
    revealedMoves: [],
    turnCount: 1,
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<BattleSnapshot> = {}): BattleSnapshot {
  const activeSelf = overrides.activeSelf ?? makePokemon({ species: 'eevee' });
  const activeOpponent =
    overrides.activeOpponent ?? makePokemon({ species: 'rattata' });
  return {
    turn: 2,
    generation: 9,
    teamSelf: { [activeSelf.species]: activeSelf },
    teamOpponent: { [activeOpponent.species]: activeOpponent },
    fieldConditions: [],
    weather: null,
    sideConditionsSelf: {},
    sideConditionsOpponent: {},
    availableMoves: [makeMove()],
    availableSwitches: [],
    forceSwitch: false,
    ...overrides,
    activeSelf,
    activeOpponent,
  };
}

/** content/type-chart.json 을 읽은 상성표 */
export async function loadTypeChart(): Promise<TypeChartService> {
  const chart = new TypeChartService();
  await chart.onModuleInit();
  return chart;
}
