// 저장소 선택: STORAGE_DRIVER=memory | pg

import { Global, Module } from '@nestjs/common';
import { DB, DrizzleModule, type DrizzleDB } from './drizzle.module.js';
import { StorageConfigService } from './storage-config.service.js';
import { BATTLE_MEMORY_REPOSITORY } from './repositories/battle-memory.repository.js';
import { DECISION_LOG_REPOSITORY } from './repositories/decision-log.repository.js';
import { DrizzleBattleMemoryRepository } from './repositories/drizzle-battle-memory.repository.js';
import { DrizzleDecisionLogRepository } from './repositories/drizzle-decision-log.repository.js';
import { InMemoryBattleMemoryRepository } from './repositories/in-memory-battle-memory.repository.js';
import { InMemoryDecisionLogRepository } from './repositories/in-memory-decision-log.repository.js';

@Global()
@Module({
  imports: [DrizzleModule],
  providers: [
    {
      provide: BATTLE_MEMORY_REPOSITORY,
      inject: [StorageConfigService, DB],
      useFactory: (config: StorageConfigService, db: DrizzleDB) =>
        config.get().driver === 'pg'
          ? new DrizzleBattleMemoryRepository(db)
          : new InMemoryBattleMemoryRepository(),
    },
    {
      provide: DECISION_LOG_REPOSITORY,
      inject: [StorageConfigService, DB],
      useFactory: (config: StorageConfigService, db: DrizzleDB) =>
        config.get().driver === 'pg'
          ? new DrizzleDecisionLogRepository(db)
          : new InMemoryDecisionLogRepository(),
    },
  ],
  exports: [BATTLE_MEMORY_REPOSITORY, DECISION_LOG_REPOSITORY],
})
export class StorageModule {}
