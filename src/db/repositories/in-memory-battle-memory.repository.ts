import type { EngineMemory } from '../types/index.js';
import type { BattleMemoryRepository } from './battle-memory.repository.js';

export class InMemoryBattleMemoryRepository implements BattleMemoryRepository {
  private readonly memories = new Map<string, EngineMemory>();

  async find(battleId: string): Promise<EngineMemory | null> {
    const memory = this.memories.get(battleId);
    return memory ? { ...memory } : null;
  }

  async save(battleId: string, memory: EngineMemory): Promise<void> {
    this.memories.set(battleId, { ...memory });
  }

  async delete(battleId: string): Promise<boolean> {
    return this.memories.delete(battleId);
  }
}
