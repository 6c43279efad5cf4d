// 외부 결정자 포트: 닫힌 후보 목록에서 하나를 고르거나 실패한다

export const DECISION_MAKER = Symbol('DECISION_MAKER');

export interface DecisionRequest {
  battleId: string;
  /** 검증용 정규화 키 목록 */
  candidates: readonly string[];
}

export interface DecisionAnswer {
  text: string;
  model: string;
  latencyMs: number;
}

export interface DecisionMakerPort {
  /** 배틀 대화를 시스템 프롬프트만 남기고 초기화 */
  resetConversation(battleId: string): void;
  addPrompt(battleId: string, prompt: string): void;
  /** null = 응답 없음 (호출 실패) */
  choose(request: DecisionRequest): Promise<DecisionAnswer | null>;
  /** 채택된 기술을 대화에 남긴다 */
  recordChoice(battleId: string, key: string): void;
  endBattle(battleId: string): void;
}
