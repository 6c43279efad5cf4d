// LLM 설정 API: 런타임으로 모델/공급자 변경

import { Body, Controller, Get, Patch } from '@nestjs/common';
import { z } from 'zod';
import { LlmConfigService, type LlmConfigPatch } from './llm-config.service.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { BadRequestError } from '../common/errors/engine-errors.js';
import { LLM_PROVIDER_NAMES } from './types/index.js';

export const LlmConfigPatchSchema = z
  .object({
    provider: z.enum(LLM_PROVIDER_NAMES),
    fallbackProvider: z.enum(LLM_PROVIDER_NAMES),
    openaiModel: z.string().min(1),
    geminiModel: z.string().min(1),
    maxRetries: z.number().int().min(1).max(5),
    timeoutMs: z.number().int().min(100).max(120_000),
    maxTokens: z.number().int().min(1).max(16384),
    temperature: z.number().min(0).max(2),
  })
  .partial()
  .strict();

@Controller('v1/settings/llm')
export class LlmSettingsController {
  constructor(private readonly configService: LlmConfigService) {}

  /** 현재 LLM 설정 조회 (API 키 마스킹) */
  @Get()
  getSettings() {
    return this.configService.getPublic();
  }

  /** LLM 설정 런타임 변경: 다음 결정 요청부터 반영 */
  @Patch()
  updateSettings(
    @Body(new ZodValidationPipe(LlmConfigPatchSchema)) body: LlmConfigPatch,
  ) {
    // 키/주소가 없는 공급자로 전환 방지
    for (const name of [body.provider, body.fallbackProvider]) {
      if (name && !this.configService.isConfigured(name)) {
        throw new BadRequestError(
          `Cannot switch to "${name}": API key not configured in .env`,
          { provider: name },
        );
      }
    }

    this.configService.update(body);

    return {
      message: 'LLM settings updated. Changes apply to the next decision.',
      ...this.configService.getPublic(),
    };
  }
}
