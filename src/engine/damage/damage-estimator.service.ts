// 기대 피해량 추정: 위력/타입 보정, 특성, 날씨/필드, 급소 기대값

import { Injectable, Logger } from '@nestjs/common';
import type {
  BattleSnapshot,
  DamageEstimate,
  MoveDamageInfo,
  MoveView,
  PokemonType,
  Weather,
} from '../../db/types/index.js';
import { TypeChartService } from '../tables/type-chart.service.js';
import {
  attackerPowerModifier,
  defensiveModifier,
  worstCaseDefensiveModifier,
  type AbilityMoveContext,
} from '../tables/ability-effects.js';

const SUN: readonly Weather[] = ['SUNNYDAY', 'DESOLATELAND'];
const RAIN: readonly Weather[] = ['RAINDANCE', 'PRIMORDIALSEA'];
const SNOW: readonly Weather[] = ['SNOW', 'HAIL', 'SNOWSCAPE'];

/** 무게 미상일 때 쓰는 heavyslam/heatcrash 위력 */
const DEFAULT_WEIGHT_POWER = 100;
const LOYALTY_POWER = 102;
const WEATHER_BALL_POWER = 100;

interface ResolvedMove {
  power: number;
  type: PokemonType;
}

/** 세대별 급소 확률표 (랭크 → 확률) */
const CRIT_CHANCE_GEN7: Record<number, number> = { 0: 1 / 24, 1: 1 / 8, 2: 1 / 2 };
const CRIT_CHANCE_GEN6: Record<number, number> = { 0: 1 / 16, 1: 1 / 8, 2: 1 / 2 };
const CRIT_CHANCE_LEGACY: Record<number, number> = {
  0: 1 / 16,
  1: 1 / 8,
  2: 1 / 4,
  3: 1 / 3,
  4: 1 / 2,
};

function critChance(stage: number, generation: number): number {
  if (generation >= 7) return CRIT_CHANCE_GEN7[stage] ?? 1;
  if (generation === 6) return CRIT_CHANCE_GEN6[stage] ?? 1;
  return CRIT_CHANCE_LEGACY[stage] ?? 0.5;
}

function critMultiplier(ability: string | null, generation: number): number {
  if (ability === 'sniper') return generation >= 6 ? 2.25 : 3;
  return generation >= 6 ? 1.5 : 2;
}

@Injectable()
export class DamageEstimatorService {
  private readonly logger = new Logger(DamageEstimatorService.name);

  constructor(private readonly typeChart: TypeChartService) {}

  /**
   * availableMoves 각각에 대해 기대 피해량과 분류 메타데이터 계산.
   * 스냅샷 + 정적 표의 순수 함수. 중간 반올림 없음.
   */
  estimate(
    snapshot: BattleSnapshot,
    lastActionTaken: string | null = null,
  ): DamageEstimate {
    const result = new Map<string, MoveDamageInfo>();
    for (const move of snapshot.availableMoves) {
      result.set(move.id, this.estimateMove(snapshot, move, lastActionTaken));
    }
    return result;
  }

  private estimateMove(
    snapshot: BattleSnapshot,
    move: MoveView,
    lastActionTaken: string | null,
  ): MoveDamageInfo {
    const attacker = snapshot.activeSelf;
    const defender = snapshot.activeOpponent;
    const { power: resolvedPower, type: moveType } = this.resolvePowerAndType(
      snapshot,
      move,
    );

    // 1) 타입 상성 → 방어 특성 (면역 우선) → tintedlens
    const rawEffectiveness = this.typeChart.multiplier(moveType, defender.types);
    const moveCtx: AbilityMoveContext = {
      moveId: move.id,
      moveType,
      category: move.category,
      flags: move.flags,
      power: resolvedPower,
      recoil: move.recoil,
      rawEffectiveness,
    };
    const defenderCtx = { hpFraction: defender.hpFraction };
    const abilityMod = defender.ability
      ? defensiveModifier(defender.ability, moveCtx, defenderCtx)
      : worstCaseDefensiveModifier(defender.possibleAbilities, moveCtx, defenderCtx);

    let effectiveness = rawEffectiveness * abilityMod;
    if (attacker.ability === 'tintedlens' && effectiveness < 1) {
      effectiveness *= 2;
    }

    const isStab = attacker.types.includes(moveType);
    if (move.category === 'STATUS' || effectiveness === 0) {
      return {
        expectedDamage: 0,
        isStab,
        effectivenessMultiplier: effectiveness,
        priority: move.priority,
      };
    }

    // 2) 위력: STAB (adaptability는 대체) → 공격 특성 → 날씨/필드
    let power = resolvedPower;
    if (isStab) power *= attacker.ability === 'adaptability' ? 2 : 1.5;

    power *= attackerPowerModifier(attacker.ability, moveCtx, {
      hpFraction: attacker.hpFraction,
      status: attacker.status,
      weather: snapshot.weather,
      turn: snapshot.turn,
      lastActionTaken,
    });

    power *= this.weatherModifier(snapshot.weather, moveType);

    const isGrounded =
      !attacker.types.includes('FLYING') && attacker.ability !== 'levitate';
    if (isGrounded) power *= this.terrainModifier(snapshot, moveType);

    // 3) 최종 보정: 화상, 벽, 날씨에 의한 방어 타입 보정
    const finalModifier = this.finalModifier(snapshot, move);

    // freezedry: 실제 방어 타입으로 상성 재계산 (물 타입 2배)
    if (move.id === 'freezedry') {
      effectiveness = defender.types.reduce(
        (acc, t) => acc * (t === 'WATER' ? 2 : this.typeChart.single('ICE', t)),
        1,
      );
    }

    // 4) 급소 기대값 + 명중률
    let critStage = move.critRatio;
    if (attacker.ability === 'superluck') critStage += 1;
    if (attacker.item === 'scopelens' || attacker.item === 'razorclaw') critStage += 1;
    const pCrit = critChance(critStage, snapshot.generation);
    const critMod = 1 + pCrit * (critMultiplier(attacker.ability, snapshot.generation) - 1);
    const accuracy = move.accuracy === true ? 1 : move.accuracy / 100;

    return {
      expectedDamage: accuracy * power * effectiveness * finalModifier * critMod,
      isStab,
      effectivenessMultiplier: effectiveness,
      priority: move.priority,
    };
  }

  /** 가변 위력/타입 기술 처리: 다른 모든 계산보다 먼저 */
  private resolvePowerAndType(snapshot: BattleSnapshot, move: MoveView): ResolvedMove {
    const weather = snapshot.weather;

    switch (move.id) {
      case 'weatherball':
        if (weather && SUN.includes(weather)) return { power: WEATHER_BALL_POWER, type: 'FIRE' };
        if (weather && RAIN.includes(weather)) return { power: WEATHER_BALL_POWER, type: 'WATER' };
        if (weather === 'SANDSTORM') return { power: WEATHER_BALL_POWER, type: 'ROCK' };
        if (weather && SNOW.includes(weather)) return { power: WEATHER_BALL_POWER, type: 'ICE' };
        return { power: move.basePower, type: move.type };

      case 'return':
      case 'frustration':
        return { power: LOYALTY_POWER, type: move.type };

      case 'heavyslam':
      case 'heatcrash':
        return { power: this.weightRatioPower(snapshot, move.id), type: move.type };

      default:
        return { power: move.basePower, type: move.type };
    }
  }

  private weightRatioPower(snapshot: BattleSnapshot, moveId: string): number {
    const userWeight = snapshot.activeSelf.weightKg;
    const targetWeight = snapshot.activeOpponent.weightKg;
    if (!userWeight || !targetWeight) {
      this.logger.debug(
        `[DAMAGE] ${moveId}: weight unknown, using default power ${DEFAULT_WEIGHT_POWER}`,
      );
      return DEFAULT_WEIGHT_POWER;
    }

    const ratio = targetWeight / userWeight;
    if (ratio < 0.2) return 120;
    if (ratio < 0.25) return 100;
    if (ratio < 1 / 3) return 80;
    if (ratio < 0.5) return 60;
    return 40;
  }

  private weatherModifier(weather: Weather | null, moveType: PokemonType): number {
    if (!weather) return 1;
    if (SUN.includes(weather)) {
      if (moveType === 'FIRE') return 1.5;
      if (moveType === 'WATER') return 0.5;
    }
    if (RAIN.includes(weather)) {
      if (moveType === 'WATER') return 1.5;
      if (moveType === 'FIRE') return 0.5;
    }
    return 1;
  }

  private terrainModifier(snapshot: BattleSnapshot, moveType: PokemonType): number {
    const fields = snapshot.fieldConditions;
    if (fields.includes('ELECTRIC_TERRAIN') && moveType === 'ELECTRIC') return 1.3;
    if (fields.includes('GRASSY_TERRAIN') && moveType === 'GRASS') return 1.3;
    if (fields.includes('PSYCHIC_TERRAIN') && moveType === 'PSYCHIC') return 1.3;
    return 1;
  }

  private finalModifier(snapshot: BattleSnapshot, move: MoveView): number {
    const attacker = snapshot.activeSelf;
    const defender = snapshot.activeOpponent;
    const opponentSide = snapshot.sideConditionsOpponent;
    const physical = move.category === 'PHYSICAL';
    const special = move.category === 'SPECIAL';
    let mod = 1;

    if (attacker.status === 'BRN' && physical && attacker.ability !== 'guts') mod *= 0.5;

    const reflect = physical && (opponentSide.REFLECT ?? 0) > 0;
    const lightScreen = special && (opponentSide.LIGHT_SCREEN ?? 0) > 0;
    if (reflect || lightScreen) {
      mod *= 0.5;
    } else if ((opponentSide.AURORA_VEIL ?? 0) > 0) {
      mod *= 0.5;
    }

    if (
      snapshot.weather === 'SANDSTORM' &&
      defender.types.includes('ROCK') &&
      special &&
      snapshot.generation >= 4
    ) {
      mod *= 1 / 1.5;
    }
    if (
      snapshot.weather === 'SNOW' &&
      defender.types.includes('ICE') &&
      physical &&
      snapshot.generation >= 9
    ) {
      mod *= 1 / 1.5;
    }
    return mod;
  }
}
