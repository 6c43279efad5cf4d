// 행동 순서 예측: 유효 스피드 (랭크, 특성, 마비, 순풍) + 트릭룸

import { Injectable } from '@nestjs/common';
import type {
  BattleSnapshot,
  PokemonView,
  SideConditions,
  Weather,
} from '../../db/types/index.js';

export type FasterSide = 'SELF' | 'OPPONENT' | 'TIE';

export interface TurnOrder {
  fasterSide: FasterSide;
  mySpeed: number;
  opponentSpeed: number;
}

const SPEED_WEATHER_ABILITIES: Record<string, readonly Weather[]> = {
  swiftswim: ['RAINDANCE', 'PRIMORDIALSEA'],
  chlorophyll: ['SUNNYDAY', 'DESOLATELAND'],
  sandrush: ['SANDSTORM'],
  slushrush: ['HAIL', 'SNOW', 'SNOWSCAPE'],
};

/** 랭크 배율: +n → (2+n)/2, -n → 2/(2+n). ±6 clamp */
export function boostFactor(stage: number): number {
  const s = Math.max(-6, Math.min(6, stage));
  return s >= 0 ? (2 + s) / 2 : 2 / (2 - s);
}

/** 이번 턴 선공 여부. 동속은 상대 선공으로 취급한다 */
export function movesFirst(order: TurnOrder): boolean {
  return order.fasterSide === 'SELF';
}

@Injectable()
export class TurnOrderService {
  resolve(snapshot: BattleSnapshot): TurnOrder {
    const mySpeed = this.effectiveSpeed(
      snapshot.activeSelf,
      snapshot.sideConditionsSelf,
      snapshot,
    );
    const opponentSpeed = this.effectiveSpeed(
      snapshot.activeOpponent,
      snapshot.sideConditionsOpponent,
      snapshot,
    );

    if (mySpeed === opponentSpeed) {
      return { fasterSide: 'TIE', mySpeed, opponentSpeed };
    }

    // 트릭룸: 느린 쪽이 먼저
    const trickRoom = snapshot.fieldConditions.includes('TRICK_ROOM');
    const selfFirst = trickRoom ? mySpeed < opponentSpeed : mySpeed > opponentSpeed;
    return { fasterSide: selfFirst ? 'SELF' : 'OPPONENT', mySpeed, opponentSpeed };
  }

  effectiveSpeed(
    pokemon: PokemonView,
    sideConditions: SideConditions,
    snapshot: BattleSnapshot,
  ): number {
    let speed = pokemon.stats.spe * boostFactor(pokemon.boosts.spe ?? 0);

    const ability = pokemon.ability;
    if (ability) {
      const weathers = SPEED_WEATHER_ABILITIES[ability];
      if (weathers && snapshot.weather && weathers.includes(snapshot.weather)) {
        speed *= 2;
      }
      if (ability === 'slowstart' && pokemon.turnCount < 5) speed *= 0.5;
    }

    if (pokemon.status === 'PAR') {
      speed *= snapshot.generation >= 7 ? 0.5 : 0.25;
    }
    if ((sideConditions.TAILWIND ?? 0) > 0) speed *= 2;

    return speed;
  }
}
