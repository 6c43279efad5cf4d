import { LlmProviderRegistryService } from './llm-provider-registry.service.js';
import { LlmConfigService } from '../llm-config.service.js';
import { MockProvider } from './mock.provider.js';
import { EngineError } from '../../common/errors/engine-errors.js';
import type { LlmProvider, LlmProviderName } from '../types/index.js';

function stubProvider(name: LlmProviderName, available: boolean): LlmProvider {
  return {
    name,
    complete: () => Promise.resolve({ text: '', model: `${name}-test`, latencyMs: 0 }),
    isAvailable: () => available,
  };
}

describe('LlmProviderRegistryService.route', () => {
  let configService: LlmConfigService;
  let registry: LlmProviderRegistryService;
  const mock = new MockProvider();

  beforeEach(() => {
    configService = new LlmConfigService();
    registry = new LlmProviderRegistryService(configService);
    registry.register(mock);
  });

  it('설정된 primary 와 다른 사용 가능 fallback', () => {
    const openai = stubProvider('openai', true);
    registry.register(openai);
    configService.update({ provider: 'openai', fallbackProvider: 'mock' });

    expect(registry.route()).toEqual({ primary: openai, fallback: mock });
  });

  it('fallback 이 primary 와 같으면 null', () => {
    configService.update({ provider: 'mock', fallbackProvider: 'mock' });

    expect(registry.route()).toEqual({ primary: mock, fallback: null });
  });

  it('사용 불가능하거나 등록되지 않은 fallback 은 null', () => {
    configService.update({ provider: 'mock', fallbackProvider: 'gemini' });
    expect(registry.route().fallback).toBeNull();

    registry.register(stubProvider('gemini', false));
    expect(registry.route().fallback).toBeNull();
  });

  it('설정 변경은 다음 route 부터 반영', () => {
    const gemini = stubProvider('gemini', true);
    registry.register(gemini);
    configService.update({ provider: 'mock', fallbackProvider: 'mock' });
    expect(registry.route().primary).toBe(mock);

    configService.update({ provider: 'gemini' });
    expect(registry.route()).toEqual({ primary: gemini, fallback: mock });
  });

  it('등록되지 않은 primary → EngineError', () => {
    configService.update({ provider: 'openai' });

    expect(() => registry.route()).toThrow(EngineError);
    expect(() => registry.route()).toThrow('LLM provider "openai" not registered');
  });
});
