// 공급자 레지스트리: 설정된 이름으로 이번 호출의 primary/fallback 경로를 정한다

import { Injectable, Logger } from '@nestjs/common';
import type { LlmProvider, LlmProviderName } from '../types/index.js';
import { LlmConfigService } from '../llm-config.service.js';
import { EngineError } from '../../common/errors/engine-errors.js';

export interface ProviderRoute {
  primary: LlmProvider;
  /** primary 와 다르고 지금 사용 가능한 공급자. 없으면 null */
  fallback: LlmProvider | null;
}

@Injectable()
export class LlmProviderRegistryService {
  private readonly logger = new Logger(LlmProviderRegistryService.name);
  private readonly providers: Partial<Record<LlmProviderName, LlmProvider>> = {};

  constructor(private readonly configService: LlmConfigService) {}

  register(provider: LlmProvider): void {
    this.providers[provider.name] = provider;
    this.logger.log(
      `Registered LLM provider: ${provider.name} (available: ${provider.isAvailable()})`,
    );
  }

  /** 매 호출마다 설정을 다시 읽는다: PATCH 가 다음 결정에 바로 반영된다 */
  route(): ProviderRoute {
    const { provider, fallbackProvider } = this.configService.get();
    const primary = this.providers[provider];
    if (!primary) {
      throw new EngineError('LLM_PROVIDER_MISSING', `LLM provider "${provider}" not registered`);
    }
    if (fallbackProvider === provider) {
      return { primary, fallback: null };
    }

    const fallback = this.providers[fallbackProvider];
    if (!fallback || !fallback.isAvailable()) {
      this.logger.debug(`Fallback provider "${fallbackProvider}" unavailable, skipping`);
      return { primary, fallback: null };
    }
    return { primary, fallback };
  }
}
