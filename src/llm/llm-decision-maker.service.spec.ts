import { LlmDecisionMakerService, MAX_CONVERSATIONS } from './llm-decision-maker.service.js';
import { LlmCallerService } from './llm-caller.service.js';
import { LlmConfigService } from './llm-config.service.js';
import { LlmProviderRegistryService } from './providers/llm-provider-registry.service.js';
import { MockProvider } from './providers/mock.provider.js';
import { BATTLE_SYSTEM_PROMPT } from './prompts/system-prompts.js';

describe('LlmDecisionMakerService', () => {
  let service: LlmDecisionMakerService;

  beforeEach(() => {
    const configService = new LlmConfigService();
    configService.update({ provider: 'mock', fallbackProvider: 'mock' });
    const registry = new LlmProviderRegistryService(configService);
    registry.register(new MockProvider());
    service = new LlmDecisionMakerService(
      new LlmCallerService(registry, configService),
      configService,
    );
  });

  it('대화 기록으로 질의하고 응답을 돌려준다', async () => {
    service.addPrompt('battle-1', 'Your ONLY available actions are: tackle, growl');

    const answer = await service.choose({ battleId: 'battle-1', candidates: ['tackle', 'growl'] });

    expect(answer?.text).toBe('tackle');
    expect(answer?.model).toBe('mock-v1');
  });

  it('채택된 기술은 assistant 메시지로 남는다', () => {
    service.addPrompt('battle-1', 'prompt');
    service.recordChoice('battle-1', 'tackle');

    expect(service.getConversation('battle-1')).toEqual([
      { role: 'system', content: BATTLE_SYSTEM_PROMPT },
      { role: 'user', content: 'prompt' },
      { role: 'assistant', content: 'tackle' },
    ]);
  });

  it('초기화하면 시스템 프롬프트만 남는다', () => {
    service.addPrompt('battle-1', 'prompt');
    service.resetConversation('battle-1');

    expect(service.getConversation('battle-1')).toEqual([
      { role: 'system', content: BATTLE_SYSTEM_PROMPT },
    ]);
  });

  it('배틀별로 대화가 분리된다', () => {
    service.addPrompt('battle-1', 'one');
    service.addPrompt('battle-2', 'two');
    service.endBattle('battle-1');

    expect(service.getConversation('battle-1')).toHaveLength(1);
    expect(service.getConversation('battle-2')).toHaveLength(2);
  });

  it('주 공급자와 fallback 이 모두 실패하면 null', async () => {
    const configService = new LlmConfigService();
    configService.update({ provider: 'mock', fallbackProvider: 'mock' });
    const registry = new LlmProviderRegistryService(configService);
    registry.register({
      name: 'mock',
      complete: () => Promise.reject(new Error('offline')),
      isAvailable: () => true,
    });
    const failing = new LlmDecisionMakerService(
      new LlmCallerService(registry, configService),
      configService,
    );

    expect(await failing.choose({ battleId: 'battle-1', candidates: ['tackle'] })).toBeNull();
  });

  it('대화 수가 한도를 넘으면 가장 오래 쉰 대화부터 버린다', () => {
    for (let i = 0; i < MAX_CONVERSATIONS; i++) {
      service.addPrompt(`battle-${i}`, 'prompt');
    }
    // battle-0 을 다시 사용해 최근으로 올린다
    service.addPrompt('battle-0', 'again');
    service.addPrompt('battle-new', 'prompt');

    expect(service.size).toBe(MAX_CONVERSATIONS);
    expect(service.getConversation('battle-0')).toHaveLength(3);
    // battle-1 은 밀려나 새 대화로 시작한다
    expect(service.getConversation('battle-1')).toEqual([
      { role: 'system', content: BATTLE_SYSTEM_PROMPT },
    ]);
  });
});
