// LLM 결정자: 배틀별 대화 기록을 유지하며 LlmCallerService 로 질의

import { Injectable, Logger } from '@nestjs/common';
import { LlmCallerService } from './llm-caller.service.js';
import { LlmConfigService } from './llm-config.service.js';
import { BATTLE_SYSTEM_PROMPT } from './prompts/system-prompts.js';
import type { ChatTurn } from './types/index.js';
import type {
  DecisionAnswer,
  DecisionMakerPort,
  DecisionRequest,
} from '../decision/ports/decision-maker.port.js';

/** 동시에 기억하는 배틀 대화 수. 넘치면 가장 오래 쉰 대화부터 버린다 */
export const MAX_CONVERSATIONS = 256;

@Injectable()
export class LlmDecisionMakerService implements DecisionMakerPort {
  private readonly logger = new Logger(LlmDecisionMakerService.name);
  private readonly conversations = new Map<string, ChatTurn[]>();

  constructor(
    private readonly caller: LlmCallerService,
    private readonly configService: LlmConfigService,
  ) {}

  resetConversation(battleId: string): void {
    this.conversations.delete(battleId);
    this.track(battleId, [{ role: 'system', content: BATTLE_SYSTEM_PROMPT }]);
    this.logger.debug(`[LLM] conversation reset: ${battleId}`);
  }

  addPrompt(battleId: string, prompt: string): void {
    this.history(battleId).push({ role: 'user', content: prompt });
  }

  async choose(request: DecisionRequest): Promise<DecisionAnswer | null> {
    const config = this.configService.get();
    const outcome = await this.caller.call({
      conversation: [...this.history(request.battleId)],
      maxTokens: config.maxTokens,
      temperature: config.temperature,
    });

    if (!outcome.ok) {
      this.logger.warn(`[LLM] no answer for ${request.battleId}: ${outcome.error}`);
      return null;
    }
    const { text, model, latencyMs } = outcome.completion;
    return { text, model, latencyMs };
  }

  recordChoice(battleId: string, key: string): void {
    this.history(battleId).push({ role: 'assistant', content: key });
  }

  endBattle(battleId: string): void {
    this.conversations.delete(battleId);
  }

  /** 현재 대화 (테스트/디버깅용 복사본) */
  getConversation(battleId: string): ChatTurn[] {
    return [...this.history(battleId)];
  }

  /** 기억 중인 배틀 수 */
  get size(): number {
    return this.conversations.size;
  }

  private history(battleId: string): ChatTurn[] {
    const messages = this.conversations.get(battleId);
    if (messages) {
      // 최근 사용 순서 유지
      this.conversations.delete(battleId);
      this.conversations.set(battleId, messages);
      return messages;
    }
    const fresh: ChatTurn[] = [{ role: 'system', content: BATTLE_SYSTEM_PROMPT }];
    this.track(battleId, fresh);
    return fresh;
  }

  private track(battleId: string, messages: ChatTurn[]): void {
    this.conversations.set(battleId, messages);
    while (this.conversations.size > MAX_CONVERSATIONS) {
      const oldest = this.conversations.keys().next();
      if (oldest.done) break;
      this.conversations.delete(oldest.value);
      this.logger.debug(`[LLM] conversation evicted: ${oldest.value}`);
    }
  }
}
