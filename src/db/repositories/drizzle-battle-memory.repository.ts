import { eq } from 'drizzle-orm';
import type { DrizzleDB } from '../drizzle.module.js';
import { battleMemories } from '../schema/index.js';
import type { EngineMemory } from '../types/index.js';
import type { BattleMemoryRepository } from './battle-memory.repository.js';

export class DrizzleBattleMemoryRepository implements BattleMemoryRepository {
  constructor(private readonly db: DrizzleDB) {}

  async find(battleId: string): Promise<EngineMemory | null> {
    const row = await this.db.query.battleMemories.findFirst({
      where: eq(battleMemories.battleId, battleId),
    });
    if (!row) return null;
    return { lastActionTaken: row.lastActionTaken, justSwitched: row.justSwitched };
  }

  async save(battleId: string, memory: EngineMemory): Promise<void> {
    const values = {
      lastActionTaken: memory.lastActionTaken,
      justSwitched: memory.justSwitched,
      updatedAt: new Date(),
    };
    await this.db
      .insert(battleMemories)
      .values({ battleId, ...values })
      .onConflictDoUpdate({ target: battleMemories.battleId, set: values });
  }

  async delete(battleId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(battleMemories)
      .where(eq(battleMemories.battleId, battleId))
      .returning({ battleId: battleMemories.battleId });
    return deleted.length > 0;
  }
}
