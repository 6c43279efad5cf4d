// OpenAI LLM 공급자: openai SDK v4 Chat Completions
// OPENAI_BASE_URL 을 주면 OpenAI 호환 로컬 서버(Ollama 등)로 보낸다

import OpenAI from 'openai';
import type { Completion, CompletionRequest, LlmProvider } from '../types/index.js';
import type { LlmConfigService } from '../llm-config.service.js';

/** 로컬 서버는 키를 검사하지 않지만 SDK 는 비어 있는 키를 거부한다 */
const LOCAL_PLACEHOLDER_KEY = 'local';

export class OpenAIProvider implements LlmProvider {
  readonly name = 'openai';
  private client: OpenAI | null = null;

  constructor(private readonly configService: LlmConfigService) {}

  private getClient(): OpenAI {
    if (!this.client) {
      const { apiKey, baseUrl } = this.configService.get().openai;
      this.client = new OpenAI({
        apiKey: apiKey || LOCAL_PLACEHOLDER_KEY,
        ...(baseUrl ? { baseURL: baseUrl } : {}),
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    const start = Date.now();
    const model = this.configService.get().openai.model;
    const client = this.getClient();

    const completion = await client.chat.completions.create({
      model,
      messages: request.conversation.map((m) => ({
        role: m.role,
        content: m.content,
      })),
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    });

    const choice = completion.choices[0];
    const text = choice?.message?.content ?? '';

    return {
      text,
      model: completion.model,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return this.configService.isConfigured(this.name);
  }
}
