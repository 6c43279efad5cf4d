import type { DecisionSource, FilterTraceEntry } from '../types/index.js';

export const DECISION_LOG_REPOSITORY = Symbol('DECISION_LOG_REPOSITORY');

export interface DecisionLogRecord {
  battleId: string;
  turn: number;
  source: DecisionSource;
  actionKey: string;
  candidates: string[];
  overriddenBy: string | null;
  /** 후보를 바꾼 필터 규칙들, 실행 순서대로 */
  filterTrace: FilterTraceEntry[];
  attempts: number;
  modelUsed: string | null;
  latencyMs: number | null;
  rawCompletion: string | null;
}

export interface DecisionLogRepository {
  insert(record: DecisionLogRecord): Promise<void>;
  /** 최신순 */
  listByBattle(battleId: string, limit: number): Promise<DecisionLogRecord[]>;
}
