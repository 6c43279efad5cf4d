// 후보 행동 필터 파이프라인: 규칙을 순서대로 적용, 첫 override 에서 종료

import { Injectable, Logger } from '@nestjs/common';
import { actionKey } from '../../common/action-keys.js';
import type {
  ActionCandidate,
  BattleSnapshot,
  DamageEstimate,
  EngineMemory,
  FilterTraceEntry,
} from '../../db/types/index.js';
import { TypeChartService } from '../tables/type-chart.service.js';
import type { TurnOrder } from '../turn-order/turn-order.service.js';
import type { FilterContext, FilterResult, FilterRule } from './filter.types.js';
import { FILTER_RULES } from './rules/index.js';
import { candidateKeys } from './rules/rule-helpers.js';
import { ViableSwitchService } from './viable-switch.service.js';

/** 스냅샷의 합법 행동: 기술 먼저, 교체 다음. 키 기준 중복 제거 */
export function legalCandidates(snapshot: BattleSnapshot): ActionCandidate[] {
  const all: ActionCandidate[] = [
    ...snapshot.availableMoves.map((m): ActionCandidate => ({ kind: 'MOVE', moveId: m.id })),
    ...snapshot.availableSwitches.map(
      (p): ActionCandidate => ({ kind: 'SWITCH', species: p.species }),
    ),
  ];
  const seen = new Set<string>();
  return all.filter((c) => {
    const key = actionKey(c);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

@Injectable()
export class ActionFilterService {
  private readonly logger = new Logger(ActionFilterService.name);
  private readonly rules: readonly FilterRule[] = FILTER_RULES;

  constructor(
    private readonly typeChart: TypeChartService,
    private readonly viableSwitch: ViableSwitchService,
  ) {}

  /**
   * 후보 집합 축소. 입력 배열은 건드리지 않는다.
   * 결과가 빈 배열일 수 있다: forfeit 이면 PASS, 아니면 호출자가 fallback 처리.
   */
  run(
    snapshot: BattleSnapshot,
    candidates: readonly ActionCandidate[],
    damage: DamageEstimate,
    order: TurnOrder,
    memory: EngineMemory,
  ): FilterResult {
    const ctx: FilterContext = {
      snapshot,
      damage,
      order,
      memory,
      typeChart: this.typeChart,
      viableSwitches: (current) => this.viableSwitch.filterCandidates(current, snapshot),
    };

    const trace: FilterTraceEntry[] = [];
    let current: ActionCandidate[] = [...candidates];

    for (const rule of this.rules) {
      const outcome = rule.apply(current, ctx);

      if (outcome.kind === 'FORFEIT') {
        trace.push({ rule: rule.name, kind: 'FORFEIT', keys: [], reason: outcome.reason });
        this.logger.log(`[FILTER] ${rule.name} forfeits the turn (${outcome.reason})`);
        return { candidates: [], overriddenBy: rule.name, forfeit: true, trace };
      }

      if (outcome.kind === 'OVERRIDE') {
        if (outcome.candidates.length === 0) continue;
        const keys = candidateKeys(outcome.candidates);
        trace.push({ rule: rule.name, kind: 'OVERRIDE', keys, reason: outcome.reason });
        this.logger.log(
          `[FILTER] ${rule.name} override → [${keys.join(', ')}] (${outcome.reason})`,
        );
        return {
          candidates: [...outcome.candidates],
          overriddenBy: rule.name,
          forfeit: false,
          trace,
        };
      }

      if (outcome.kind === 'REMOVE') {
        const removed = new Set(outcome.keys);
        const before = current.length;
        current = current.filter((c) => !removed.has(actionKey(c)));
        if (current.length === before) continue;
        trace.push({
          rule: rule.name,
          kind: 'REMOVE',
          keys: outcome.keys,
          reason: outcome.reason,
        });
        this.logger.log(
          `[FILTER] ${rule.name} removed [${outcome.keys.join(', ')}] (${outcome.reason})`,
        );
      }
    }

    this.logger.debug(`[FILTER] remaining [${candidateKeys(current).join(', ')}]`);
    return { candidates: current, overriddenBy: null, forfeit: false, trace };
  }
}
