import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { StorageModule } from './db/storage.module.js';
import { EngineExceptionFilter } from './common/filters/engine-exception.filter.js';
import { EngineModule } from './engine/engine.module.js';
import { LlmModule } from './llm/llm.module.js';
import { DecisionModule } from './decision/decision.module.js';

@Module({
  imports: [StorageModule, EngineModule, LlmModule, DecisionModule],
  providers: [
    {
      provide: APP_FILTER,
      useClass: EngineExceptionFilter,
    },
  ],
})
export class AppModule {}
