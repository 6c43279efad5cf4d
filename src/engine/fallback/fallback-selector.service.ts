// 결정자 실패 시 대체 선택: 최대 기대 피해 → 무작위 교체 → 변화 기술 → 패스

import { Injectable, Logger } from '@nestjs/common';
import type {
  BattleSnapshot,
  CommittedAction,
  DamageEstimate,
  SwitchAction,
} from '../../db/types/index.js';
import { RngService } from '../rng/rng.service.js';

export type FallbackReason = 'BEST_DAMAGE' | 'RANDOM_SWITCH' | 'FIRST_STATUS' | 'PASS';

export interface FallbackChoice {
  action: CommittedAction;
  reason: FallbackReason;
}

@Injectable()
export class FallbackSelectorService {
  private readonly logger = new Logger(FallbackSelectorService.name);

  constructor(private readonly rng: RngService) {}

  select(snapshot: BattleSnapshot, damage: DamageEstimate, battleId: string): FallbackChoice {
    const best = this.bestDamageMove(snapshot, damage);
    if (best) {
      this.logger.warn(
        `[FALLBACK] best damage move ${best.moveId} (${best.expectedDamage.toFixed(1)})`,
      );
      return { action: { kind: 'MOVE', moveId: best.moveId }, reason: 'BEST_DAMAGE' };
    }

    const randomSwitch = this.randomSwitch(snapshot, battleId);
    if (randomSwitch) {
      return { action: randomSwitch, reason: 'RANDOM_SWITCH' };
    }

    const status = snapshot.availableMoves.find((m) => m.category === 'STATUS');
    if (status) {
      this.logger.warn(`[FALLBACK] no damaging move, using ${status.id}`);
      return { action: { kind: 'MOVE', moveId: status.id }, reason: 'FIRST_STATUS' };
    }

    this.logger.warn('[FALLBACK] nothing to do, passing the turn');
    return { action: { kind: 'PASS' }, reason: 'PASS' };
  }

  /** seed `<battleId>:<turn>` 로 합법 교체 중 하나. 없으면 null */
  randomSwitch(snapshot: BattleSnapshot, battleId: string): SwitchAction | null {
    const target = this.rng
      .forTurn(battleId, snapshot.turn)
      .pick(snapshot.availableSwitches);
    if (!target) return null;
    this.logger.warn(`[FALLBACK] random switch to ${target.species}`);
    return { kind: 'SWITCH', species: target.species };
  }

  /** 기대 피해 > 0 인 기술 중 최대. 동률이면 먼저 나온 기술 */
  private bestDamageMove(
    snapshot: BattleSnapshot,
    damage: DamageEstimate,
  ): { moveId: string; expectedDamage: number } | null {
    let best: { moveId: string; expectedDamage: number } | null = null;
    for (const move of snapshot.availableMoves) {
      const expected = damage.get(move.id)?.expectedDamage ?? 0;
      if (expected > (best?.expectedDamage ?? 0)) {
        best = { moveId: move.id, expectedDamage: expected };
      }
    }
    return best;
  }
}
