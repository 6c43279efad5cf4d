// LLM 호출 서비스: 타임아웃 + 재시도 + fallback 전략

import { Injectable, Logger } from '@nestjs/common';
import { LlmProviderRegistryService } from './providers/llm-provider-registry.service.js';
import { LlmConfigService } from './llm-config.service.js';
import type {
  CallOutcome,
  Completion,
  CompletionRequest,
  FailureKind,
  LlmProvider,
} from './types/index.js';

export class LlmTimeoutError extends Error {
  constructor(provider: string, timeoutMs: number) {
    super(`LLM provider "${provider}" timed out after ${timeoutMs}ms`);
    this.name = 'LlmTimeoutError';
  }
}

@Injectable()
export class LlmCallerService {
  private readonly logger = new Logger(LlmCallerService.name);

  constructor(
    private readonly registry: LlmProviderRegistryService,
    private readonly configService: LlmConfigService,
  ) {}

  async call(request: CompletionRequest): Promise<CallOutcome> {
    const config = this.configService.get();
    const { primary, fallback } = this.registry.route();
    const maxAttempts = Math.max(1, config.maxRetries);
    let attempts = 0;

    // Primary: RETRYABLE 오류일 때만 maxRetries 까지 재시도
    while (attempts < maxAttempts) {
      attempts++;
      try {
        const completion = await this.completeWithTimeout(primary, request, config.timeoutMs);
        return { ok: true, completion, provider: primary.name, attempts };
      } catch (err) {
        const kind = this.classifyError(err);
        this.logger.warn(
          `Primary "${primary.name}" attempt ${attempts} failed (${kind}): ${String(err)}`,
        );
        if (kind === 'PERMANENT') break;
      }
    }

    if (!fallback) {
      return {
        ok: false,
        error: `Primary "${primary.name}" failed after ${attempts} attempts, no fallback available`,
        provider: primary.name,
        attempts,
      };
    }

    attempts++;
    try {
      const completion = await this.completeWithTimeout(fallback, request, config.timeoutMs);
      this.logger.log(`Fallback "${fallback.name}" succeeded`);
      return { ok: true, completion, provider: fallback.name, attempts };
    } catch (fallbackErr) {
      this.logger.error(`Fallback "${fallback.name}" also failed: ${String(fallbackErr)}`);
      return {
        ok: false,
        error: `All providers failed after ${attempts} attempts`,
        provider: fallback.name,
        attempts,
      };
    }
  }

  private async completeWithTimeout(
    provider: LlmProvider,
    request: CompletionRequest,
    timeoutMs: number,
  ): Promise<Completion> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new LlmTimeoutError(provider.name, timeoutMs)), timeoutMs);
    });
    try {
      return await Promise.race([provider.complete(request), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private classifyError(err: unknown): FailureKind {
    if (err instanceof LlmTimeoutError) return 'RETRYABLE';

    const message = String(err).toLowerCase();
    const status =
      err && typeof err === 'object' && 'status' in err && typeof err.status === 'number'
        ? err.status
        : 0;

    // PERMANENT: auth, invalid model, content policy
    if (status === 401 || status === 403) return 'PERMANENT';
    if (message.includes('invalid_model') || message.includes('model_not_found'))
      return 'PERMANENT';
    if (message.includes('content_policy') || message.includes('content_filter'))
      return 'PERMANENT';

    // 그 외 (rate limit, 5xx, overloaded) 는 재시도
    return 'RETRYABLE';
  }
}
