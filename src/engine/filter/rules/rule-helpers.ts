import { actionKey } from '../../../common/action-keys.js';
import type {
  ActionCandidate,
  MoveAction,
  MoveView,
  SwitchAction,
} from '../../../db/types/index.js';
import type { FilterContext, RuleOutcome } from '../filter.types.js';

export const KEEP: RuleOutcome = { kind: 'KEEP' };

export function moveCandidates(candidates: readonly ActionCandidate[]): MoveAction[] {
  return candidates.filter((c): c is MoveAction => c.kind === 'MOVE');
}

export function switchCandidates(candidates: readonly ActionCandidate[]): SwitchAction[] {
  return candidates.filter((c): c is SwitchAction => c.kind === 'SWITCH');
}

export function hasMove(candidates: readonly ActionCandidate[], moveId: string): boolean {
  return candidates.some((c) => c.kind === 'MOVE' && c.moveId === moveId);
}

export function findMove(ctx: FilterContext, moveId: string): MoveView | undefined {
  return ctx.snapshot.availableMoves.find((m) => m.id === moveId);
}

/** 후보에 실제로 남아 있는 기술만 골라 REMOVE. 없으면 KEEP */
export function removeMoves(
  candidates: readonly ActionCandidate[],
  moveIds: readonly string[],
  reason: string,
): RuleOutcome {
  const keys = moveIds.filter((id) => hasMove(candidates, id));
  return keys.length > 0 ? { kind: 'REMOVE', keys, reason } : KEEP;
}

/** 조건을 만족하는 기술 후보 제거 */
export function removeMovesWhere(
  candidates: readonly ActionCandidate[],
  ctx: FilterContext,
  predicate: (move: MoveView) => boolean,
  reason: string,
): RuleOutcome {
  const ids = moveCandidates(candidates)
    .map((c) => findMove(ctx, c.moveId))
    .filter((m): m is MoveView => m !== undefined && predicate(m))
    .map((m) => m.id);
  return removeMoves(candidates, ids, reason);
}

/** 대체 후보로 종료. 대체 후보가 비면 발동하지 않는다 */
export function override(candidates: ActionCandidate[], reason: string): RuleOutcome {
  return candidates.length > 0 ? { kind: 'OVERRIDE', candidates, reason } : KEEP;
}

export function overrideWithViableSwitches(
  candidates: readonly ActionCandidate[],
  ctx: FilterContext,
  reason: string,
): RuleOutcome {
  return override(ctx.viableSwitches(candidates), reason);
}

export function expectedDamage(ctx: FilterContext, moveId: string): number {
  return ctx.damage.get(moveId)?.expectedDamage ?? 0;
}

export function effectiveness(ctx: FilterContext, moveId: string): number {
  return ctx.damage.get(moveId)?.effectivenessMultiplier ?? 1;
}

export function candidateKeys(candidates: readonly ActionCandidate[]): string[] {
  return candidates.map(actionKey);
}

/** 기대 피해량 기준선 (명중률 0~100 스케일) */
export const RECIPROCAL_KO_DAMAGE = 200;
export const SECURE_KO_DAMAGE = 250;
export const LOW_DAMAGE = 50;
