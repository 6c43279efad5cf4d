// 교체 후보 평가: 상대가 약점을 찌를 수 있는 포켓몬은 내보내지 않는다

import { Injectable, Logger } from '@nestjs/common';
import { normalizeSpecies } from '../../common/action-keys.js';
import type {
  ActionCandidate,
  BattleSnapshot,
  PokemonType,
  PokemonView,
  SwitchAction,
} from '../../db/types/index.js';
import { TypeChartService } from '../tables/type-chart.service.js';

@Injectable()
export class ViableSwitchService {
  private readonly logger = new Logger(ViableSwitchService.name);

  constructor(private readonly typeChart: TypeChartService) {}

  /**
   * 후보 중 교체 후보만 평가해서 돌려준다.
   * 공개된 공격 기술(없으면 상대 자신의 타입)에 1배 초과로 맞는 대상을 제외.
   * 스냅샷에 정보가 없는 대상은 남기고, 전부 제외되면 입력을 그대로 돌려준다.
   */
  filterCandidates(
    candidates: readonly ActionCandidate[],
    snapshot: BattleSnapshot,
  ): SwitchAction[] {
    const switches = candidates.filter(
      (c): c is SwitchAction => c.kind === 'SWITCH',
    );
    if (switches.length === 0) return [];

    const threats = this.threatTypes(snapshot.activeOpponent);
    const weak = switches.filter((s) => {
      const view = this.findView(snapshot, s.species);
      // 정보가 없는 후보는 판단하지 않는다
      return view !== undefined && this.isWeakTo(view, threats);
    });

    if (weak.length === switches.length) {
      this.logger.warn('[SWITCH] every switch is weak to the opponent, keeping all');
      return switches;
    }
    for (const s of weak) {
      this.logger.debug(`[SWITCH] dropping ${s.species} (weak to opponent)`);
    }
    return switches.filter((s) => !weak.includes(s));
  }

  private threatTypes(opponent: PokemonView): PokemonType[] {
    if (opponent.revealedMoves.length > 0) {
      return opponent.revealedMoves
        .filter((m) => m.category !== 'STATUS')
        .map((m) => m.type);
    }
    return opponent.types;
  }

  private isWeakTo(target: PokemonView, threats: readonly PokemonType[]): boolean {
    return threats.some((t) => this.typeChart.multiplier(t, target.types) > 1);
  }

  private findView(snapshot: BattleSnapshot, species: string): PokemonView | undefined {
    const key = normalizeSpecies(species);
    return (
      snapshot.availableSwitches.find((p) => normalizeSpecies(p.species) === key) ??
      Object.values(snapshot.teamSelf).find((p) => normalizeSpecies(p.species) === key)
    );
  }
}
