// 결정 오케스트레이션 설정: 시도 횟수, 스냅샷 대기 시간

import { Injectable } from '@nestjs/common';

export interface DecisionConfig {
  /** 결정자에게 묻는 최대 횟수 */
  maxAttempts: number;
  /** 기술 목록이 비어 있을 때 기다리는 최대 시간 */
  legalActionWaitMs: number;
  pollMs: number;
  /** 직후 교체 뒤 forceSwitch 가 풀리길 기다리는 시간 */
  forceSwitchWaitMs: number;
}

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

@Injectable()
export class DecisionConfigService {
  private config: DecisionConfig;

  constructor() {
    this.config = {
      maxAttempts: Math.max(1, intFromEnv('DECISION_MAX_ATTEMPTS', 3)),
      legalActionWaitMs: intFromEnv('LEGAL_ACTION_WAIT_MS', 3000),
      pollMs: Math.max(1, intFromEnv('LEGAL_ACTION_POLL_MS', 100)),
      forceSwitchWaitMs: intFromEnv('FORCE_SWITCH_WAIT_MS', 1000),
    };
  }

  get(): DecisionConfig {
    return this.config;
  }

  update(patch: Partial<DecisionConfig>): DecisionConfig {
    this.config = { ...this.config, ...patch };
    return this.config;
  }
}
