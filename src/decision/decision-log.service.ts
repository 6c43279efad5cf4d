// 결정 기록: 저장 실패는 로그만 남기고 결정 흐름을 막지 않는다

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DECISION_LOG_REPOSITORY,
  type DecisionLogRecord,
  type DecisionLogRepository,
} from '../db/repositories/decision-log.repository.js';

@Injectable()
export class DecisionLogService {
  private readonly logger = new Logger(DecisionLogService.name);

  constructor(
    @Inject(DECISION_LOG_REPOSITORY) private readonly repository: DecisionLogRepository,
  ) {}

  async record(entry: DecisionLogRecord): Promise<void> {
    try {
      await this.repository.insert(entry);
    } catch (err) {
      this.logger.error(
        `Failed to write decision log for ${entry.battleId} turn ${entry.turn}`,
        err instanceof Error ? err.stack : String(err),
      );
    }
  }

  list(battleId: string, limit: number): Promise<DecisionLogRecord[]> {
    return this.repository.listByBattle(battleId, limit);
  }
}
