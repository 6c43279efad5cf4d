// Mock LLM 공급자: 외부 호출 없이 프롬프트에 나열된 첫 번째 행동을 답한다

import type { Completion, CompletionRequest, LlmProvider } from '../types/index.js';

const LISTED_ACTIONS = /available (?:actions|team members) are: ([a-z0-9-]+)/;

export class MockProvider implements LlmProvider {
  readonly name = 'mock';

  async complete(request: CompletionRequest): Promise<Completion> {
    const start = Date.now();

    const lastUserMsg = [...request.conversation]
      .reverse()
      .find((m) => m.role === 'user');

    const match = lastUserMsg ? LISTED_ACTIONS.exec(lastUserMsg.content) : null;
    const text = match?.[1] ?? '';

    return {
      text,
      model: 'mock-v1',
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return true;
  }
}
