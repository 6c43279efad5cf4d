import type {
  DecisionLogRecord,
  DecisionLogRepository,
} from './decision-log.repository.js';

export class InMemoryDecisionLogRepository implements DecisionLogRepository {
  private readonly records: DecisionLogRecord[] = [];

  async insert(record: DecisionLogRecord): Promise<void> {
    this.records.push({
      ...record,
      candidates: [...record.candidates],
      filterTrace: record.filterTrace.map((entry) => ({ ...entry, keys: [...entry.keys] })),
    });
  }

  async listByBattle(battleId: string, limit: number): Promise<DecisionLogRecord[]> {
    return this.records
      .filter((r) => r.battleId === battleId)
      .reverse()
      .slice(0, limit);
  }
}
