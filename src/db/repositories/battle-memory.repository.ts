import type { EngineMemory } from '../types/index.js';

export const BATTLE_MEMORY_REPOSITORY = Symbol('BATTLE_MEMORY_REPOSITORY');

/** 배틀별 EngineMemory 저장소 */
export interface BattleMemoryRepository {
  find(battleId: string): Promise<EngineMemory | null>;
  save(battleId: string, memory: EngineMemory): Promise<void>;
  /** 삭제했으면 true */
  delete(battleId: string): Promise<boolean>;
}
