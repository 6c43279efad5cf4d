import type { BattleSnapshot } from '../../db/types/index.js';

/** 호출 시점의 최신 스냅샷. 대기 루프가 반복 호출한다 */
export interface SnapshotProvider {
  /** false 면 다시 읽어도 값이 같으므로 대기하지 않는다 */
  readonly live: boolean;
  current(): BattleSnapshot;
}

/** HTTP 요청 본문처럼 값이 고정된 스냅샷 */
export class ConstantSnapshotProvider implements SnapshotProvider {
  readonly live = false;

  constructor(private readonly snapshot: BattleSnapshot) {}

  current(): BattleSnapshot {
    return this.snapshot;
  }
}
