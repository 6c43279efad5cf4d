import type {
  ActionCandidate,
  BattleSnapshot,
  DamageEstimate,
  EngineMemory,
  FilterTraceEntry,
  SwitchAction,
} from '../../db/types/index.js';
import type { TypeChartService } from '../tables/type-chart.service.js';
import type { TurnOrder } from '../turn-order/turn-order.service.js';

/** 한 턴 동안 규칙들이 공유하는 읽기 전용 문맥 */
export interface FilterContext {
  snapshot: BattleSnapshot;
  damage: DamageEstimate;
  order: TurnOrder;
  memory: EngineMemory;
  typeChart: TypeChartService;
  /** 후보 중 교체 후보를 Viable Switch Filter 에 통과시킨 결과 */
  viableSwitches(candidates: readonly ActionCandidate[]): SwitchAction[];
}

export type RuleOutcome =
  | { kind: 'KEEP' }
  | { kind: 'REMOVE'; keys: string[]; reason: string }
  | { kind: 'OVERRIDE'; candidates: ActionCandidate[]; reason: string }
  /** 할 수 있는 행동이 없어 턴을 넘긴다 */
  | { kind: 'FORFEIT'; reason: string };

export interface FilterRule {
  name: string;
  apply(candidates: readonly ActionCandidate[], ctx: FilterContext): RuleOutcome;
}

export interface FilterResult {
  candidates: ActionCandidate[];
  /** 종료시킨 override/forfeit 규칙 이름. 없으면 null */
  overriddenBy: string | null;
  /** true 면 candidates 는 비어 있고 호출자는 PASS 를 커밋한다 */
  forfeit: boolean;
  trace: FilterTraceEntry[];
}
