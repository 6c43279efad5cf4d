// LLM 설정 서비스: .env 기본값 + 런타임 변경 지원

import { Injectable, Logger } from '@nestjs/common';
import {
  LLM_PROVIDER_NAMES,
  type LlmConfig,
  type LlmProviderName,
} from './types/index.js';

/** PATCH /v1/settings/llm 에서 변경 가능한 필드 (API 키와 주소는 .env 전용) */
export interface LlmConfigPatch {
  provider?: LlmProviderName;
  fallbackProvider?: LlmProviderName;
  openaiModel?: string;
  geminiModel?: string;
  maxRetries?: number;
  timeoutMs?: number;
  maxTokens?: number;
  temperature?: number;
}

/** GET 응답: API 키는 설정 여부만 */
export interface LlmConfigPublic {
  provider: LlmProviderName;
  fallbackProvider: LlmProviderName;
  openaiModel: string;
  openaiApiKeySet: boolean;
  openaiBaseUrl: string;
  geminiModel: string;
  geminiApiKeySet: boolean;
  maxRetries: number;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
  availableProviders: LlmProviderName[];
}

function providerName(value: string | undefined, fallback: LlmProviderName): LlmProviderName {
  return LLM_PROVIDER_NAMES.find((name) => name === value) ?? fallback;
}

@Injectable()
export class LlmConfigService {
  private readonly logger = new Logger(LlmConfigService.name);
  private config: LlmConfig;

  constructor() {
    this.config = {
      provider: providerName(process.env.LLM_PROVIDER, 'mock'),
      fallbackProvider: providerName(process.env.LLM_FALLBACK_PROVIDER, 'mock'),
      openai: {
        apiKey: process.env.OPENAI_API_KEY ?? '',
        model: process.env.OPENAI_MODEL ?? 'gpt-4o-mini',
        baseUrl: process.env.OPENAI_BASE_URL ?? '',
      },
      gemini: {
        apiKey: process.env.GEMINI_API_KEY ?? '',
        model: process.env.GEMINI_MODEL ?? 'gemini-2.0-flash',
      },
      maxRetries: parseInt(process.env.LLM_MAX_RETRIES ?? '2', 10),
      timeoutMs: parseInt(process.env.LLM_TIMEOUT_MS ?? '8000', 10),
      maxTokens: parseInt(process.env.LLM_MAX_TOKENS ?? '16', 10),
      temperature: parseFloat(process.env.LLM_TEMPERATURE ?? '0.2'),
    };
  }

  get(): LlmConfig {
    return this.config;
  }

  /** 런타임 설정 변경: 다음 결정 요청부터 반영 */
  update(patch: LlmConfigPatch): LlmConfig {
    const { openaiModel, geminiModel, ...rest } = patch;
    const current = this.config;
    this.config = {
      ...current,
      ...rest,
      openai: { ...current.openai, model: openaiModel ?? current.openai.model },
      gemini: { ...current.gemini, model: geminiModel ?? current.gemini.model },
    };
    this.logger.log(`LLM config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }

  getPublic(): LlmConfigPublic {
    const { openai, gemini } = this.config;
    return {
      provider: this.config.provider,
      fallbackProvider: this.config.fallbackProvider,
      openaiModel: openai.model,
      openaiApiKeySet: openai.apiKey !== '',
      openaiBaseUrl: openai.baseUrl,
      geminiModel: gemini.model,
      geminiApiKeySet: gemini.apiKey !== '',
      maxRetries: this.config.maxRetries,
      timeoutMs: this.config.timeoutMs,
      maxTokens: this.config.maxTokens,
      temperature: this.config.temperature,
      availableProviders: LLM_PROVIDER_NAMES.filter((name) => this.isConfigured(name)),
    };
  }

  /** 공급자 사용 가능 여부: mock 은 항상, 나머지는 키 또는 로컬 서버 주소 */
  isConfigured(name: LlmProviderName): boolean {
    switch (name) {
      case 'mock':
        return true;
      case 'openai':
        return this.config.openai.apiKey !== '' || this.config.openai.baseUrl !== '';
      case 'gemini':
        return this.config.gemini.apiKey !== '';
    }
  }
}
