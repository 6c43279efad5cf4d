/** 후보를 바꾼 규칙 한 건. 결정 로그에 그대로 저장된다 */
export interface FilterTraceEntry {
  rule: string;
  kind: 'REMOVE' | 'OVERRIDE' | 'FORFEIT';
  /** 제거된 키 또는 override 로 남은 키. FORFEIT 이면 빈 배열 */
  keys: string[];
  reason: string;
}
