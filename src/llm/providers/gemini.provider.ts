// Gemini LLM 공급자: @google/genai SDK
//
// 변환 로직:
// - OpenAI의 role: assistant -> Gemini의 role: model
// - system 메시지는 systemInstruction으로 분리

import { Logger } from '@nestjs/common';
import { FinishReason, GoogleGenAI } from '@google/genai';
import type { Completion, CompletionRequest, LlmProvider } from '../types/index.js';
import type { LlmConfigService } from '../llm-config.service.js';

export class GeminiProvider implements LlmProvider {
  readonly name = 'gemini';
  private readonly logger = new Logger(GeminiProvider.name);
  private client: GoogleGenAI | null = null;

  constructor(private readonly configService: LlmConfigService) {}

  private getClient(): GoogleGenAI {
    if (!this.client) {
      this.client = new GoogleGenAI({ apiKey: this.configService.get().gemini.apiKey });
    }
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    const start = Date.now();
    const model = this.configService.get().gemini.model;
    const client = this.getClient();

    // system 메시지 분리
    const systemMessages = request.conversation.filter((m) => m.role === 'system');
    const nonSystemMessages = request.conversation.filter((m) => m.role !== 'system');

    const contents = nonSystemMessages.map((m) => ({
      role: m.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: m.content }],
    }));

    const systemInstruction = systemMessages.length > 0
      ? systemMessages.map((m) => m.content).join('\n\n')
      : undefined;

    const response = await client.models.generateContent({
      model,
      contents,
      config: {
        maxOutputTokens: request.maxTokens,
        temperature: request.temperature,
        ...(systemInstruction ? { systemInstruction } : {}),
      },
    });

    const text = response.text ?? '';

    const finishReason = response.candidates?.[0]?.finishReason;
    if (finishReason && finishReason !== FinishReason.STOP) {
      this.logger.warn(`finishReason: ${finishReason}, text length: ${text.length}`);
    }

    return {
      text,
      model,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return this.configService.isConfigured(this.name);
  }
}
