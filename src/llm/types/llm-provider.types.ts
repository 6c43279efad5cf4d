// 결정자용 LLM 계약: 공급자는 짧은 대화를 받아 행동 키 하나를 답한다

export const LLM_PROVIDER_NAMES = ['mock', 'openai', 'gemini'] as const;
export type LlmProviderName = (typeof LLM_PROVIDER_NAMES)[number];

/** 배틀 대화의 한 줄. system 은 첫 줄에만 온다 */
export interface ChatTurn {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  conversation: readonly ChatTurn[];
  maxTokens: number;
  temperature: number;
}

export interface Completion {
  text: string;
  model: string;
  latencyMs: number;
}

export interface LlmProvider {
  readonly name: LlmProviderName;
  complete(request: CompletionRequest): Promise<Completion>;
  isAvailable(): boolean;
}

/** 재시도 여부 판정 */
export type FailureKind = 'RETRYABLE' | 'PERMANENT';

export type CallOutcome =
  | { ok: true; completion: Completion; provider: LlmProviderName; attempts: number }
  | { ok: false; error: string; provider: LlmProviderName; attempts: number };

export interface OpenAiSettings {
  apiKey: string;
  model: string;
  /** OpenAI 호환 로컬 서버 (예: Ollama http://localhost:11434/v1). 빈 값이면 공식 API */
  baseUrl: string;
}

export interface GeminiSettings {
  apiKey: string;
  model: string;
}

export interface LlmConfig {
  provider: LlmProviderName;
  fallbackProvider: LlmProviderName;
  openai: OpenAiSettings;
  gemini: GeminiSettings;
  maxRetries: number;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}
