import { desc, eq } from 'drizzle-orm';
import type { DrizzleDB } from '../drizzle.module.js';
import { decisionLogs } from '../schema/index.js';
import type {
  DecisionLogRecord,
  DecisionLogRepository,
} from './decision-log.repository.js';

export class DrizzleDecisionLogRepository implements DecisionLogRepository {
  constructor(private readonly db: DrizzleDB) {}

  async insert(record: DecisionLogRecord): Promise<void> {
    await this.db.insert(decisionLogs).values(record);
  }

  async listByBattle(battleId: string, limit: number): Promise<DecisionLogRecord[]> {
    const rows = await this.db
      .select()
      .from(decisionLogs)
      .where(eq(decisionLogs.battleId, battleId))
      .orderBy(desc(decisionLogs.createdAt))
      .limit(limit);
    return rows.map((row) => ({
      battleId: row.battleId,
      turn: row.turn,
      source: row.source,
      actionKey: row.actionKey,
      candidates: row.candidates,
      overriddenBy: row.overriddenBy,
      filterTrace: row.filterTrace,
      attempts: row.attempts,
      modelUsed: row.modelUsed,
      latencyMs: row.latencyMs,
      rawCompletion: row.rawCompletion,
    }));
  }
}
