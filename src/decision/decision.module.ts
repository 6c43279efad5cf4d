import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { LlmModule } from '../llm/llm.module.js';
import { LlmDecisionMakerService } from '../llm/llm-decision-maker.service.js';
import { DecisionController } from './decision.controller.js';
import { DecisionService } from './decision.service.js';
import { DecisionConfigService } from './decision-config.service.js';
import { DecisionLogService } from './decision-log.service.js';
import { DECISION_MAKER } from './ports/decision-maker.port.js';

@Module({
  imports: [EngineModule, LlmModule],
  controllers: [DecisionController],
  providers: [
    DecisionService,
    DecisionConfigService,
    DecisionLogService,
    { provide: DECISION_MAKER, useExisting: LlmDecisionMakerService },
  ],
  exports: [DecisionService],
})
export class DecisionModule {}
