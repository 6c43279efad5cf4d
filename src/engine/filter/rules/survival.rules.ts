// 생존/교체 강제 규칙: 대부분 override

import { normalizeSpecies } from '../../../common/action-keys.js';
import { BOOST_STAT, type ActionCandidate } from '../../../db/types/index.js';
import {
  MAX_STAGE,
  OPPONENT_SIDE_HAZARDS,
  SPECIAL_WALLS,
  includesMove,
} from '../../tables/move-lists.js';
import { movesFirst } from '../../turn-order/turn-order.service.js';
import type { FilterContext, FilterRule } from '../filter.types.js';
import {
  KEEP,
  RECIPROCAL_KO_DAMAGE,
  SECURE_KO_DAMAGE,
  effectiveness,
  expectedDamage,
  moveCandidates,
  override,
  overrideWithViableSwitches,
  switchCandidates,
} from './rule-helpers.js';

/** 상대가 한 방에 쓰러뜨릴 수 있는 매치업인가 */
function hasKoThreat(ctx: FilterContext): boolean {
  const me = ctx.snapshot.activeSelf;
  const opponent = ctx.snapshot.activeOpponent;
  if (opponent.revealedMoves.length > 0) {
    return opponent.revealedMoves.some(
      (m) => m.category !== 'STATUS' && ctx.typeChart.multiplier(m.type, me.types) === 4,
    );
  }
  return opponent.types.some((t) => ctx.typeChart.multiplier(t, me.types) > 1);
}

function movesAtLeast(
  candidates: readonly ActionCandidate[],
  ctx: FilterContext,
  threshold: number,
): ActionCandidate[] {
  return moveCandidates(candidates).filter(
    (c) => expectedDamage(ctx, c.moveId) >= threshold,
  );
}

export const mortalPerilRule: FilterRule = {
  name: 'mortal-peril',
  apply(candidates, ctx) {
    if (!hasKoThreat(ctx)) return KEEP;
    const species = ctx.snapshot.activeSelf.species;

    if (!movesFirst(ctx.order)) {
      return overrideWithViableSwitches(
        candidates,
        ctx,
        `${species} is slower and weak to the opponent`,
      );
    }
    const koMoves = movesAtLeast(candidates, ctx, RECIPROCAL_KO_DAMAGE);
    if (koMoves.length === 0) {
      return overrideWithViableSwitches(
        candidates,
        ctx,
        `${species} is faster but cannot knock out the opponent`,
      );
    }
    return override(koMoves, `${species} is faster and can knock out first`);
  },
};

export const stepOnThroatRule: FilterRule = {
  name: 'step-on-throat',
  apply(candidates, ctx) {
    if (ctx.snapshot.activeOpponent.hpFraction >= 0.5) return KEEP;
    if (!movesFirst(ctx.order)) return KEEP;
    return override(
      movesAtLeast(candidates, ctx, SECURE_KO_DAMAGE),
      'opponent is low and a secure knockout is available',
    );
  },
};

export const lockedPoorMoveRule: FilterRule = {
  name: 'locked-poor-move',
  apply(candidates, ctx) {
    const moves = ctx.snapshot.availableMoves;
    if (moves.length !== 1) return KEEP;
    const locked = moves[0];
    if (effectiveness(ctx, locked.id) >= 1) return KEEP;
    return overrideWithViableSwitches(
      candidates,
      ctx,
      `locked into not very effective ${locked.id}`,
    );
  },
};

export const offenseCollapseRule: FilterRule = {
  name: 'offense-collapse',
  apply(candidates, ctx) {
    const boosts = ctx.snapshot.activeSelf.boosts;
    const atk = boosts.atk ?? 0;
    const spa = boosts.spa ?? 0;
    const moves = ctx.snapshot.availableMoves;
    const physical = moves.filter((m) => m.category === 'PHYSICAL').length;
    const special = moves.filter((m) => m.category === 'SPECIAL').length;

    let collapsed = false;
    if (physical > special) collapsed = atk <= -2;
    else if (special > physical) collapsed = spa <= -2;
    else collapsed = atk <= -2 || spa <= -2;

    if (!collapsed) return KEEP;
    return overrideWithViableSwitches(candidates, ctx, 'attacking stat dropped to -2 or lower');
  },
};

export const truantLoafRule: FilterRule = {
  name: 'truant-loaf',
  apply(candidates, ctx) {
    const me = ctx.snapshot.activeSelf;
    if (me.ability !== 'truant' || !me.mustRecharge) return KEEP;
    const switches = switchCandidates(candidates);
    if (switches.length === 0) {
      return { kind: 'FORFEIT', reason: 'truant is loafing with no switch available' };
    }
    return override(switches, 'truant is loafing this turn');
  },
};

/** 앙코르로 묶인 기술이 더 이상 쓸모없는가 */
function lockedMoveUseless(ctx: FilterContext): boolean {
  const [locked] = ctx.snapshot.availableMoves;
  const me = ctx.snapshot.activeSelf;
  if (locked.category !== 'STATUS') return effectiveness(ctx, locked.id) < 1;

  const boosts = locked.boosts;
  if (boosts) {
    const raised = BOOST_STAT.filter((stat) => (boosts[stat] ?? 0) > 0);
    if (raised.length > 0 && raised.every((stat) => (me.boosts[stat] ?? 0) >= MAX_STAGE)) {
      return true;
    }
  }

  const hazard = OPPONENT_SIDE_HAZARDS[locked.id];
  if (hazard) {
    return (ctx.snapshot.sideConditionsOpponent[hazard.condition] ?? 0) >= hazard.cap;
  }
  return false;
}

export const continuationLockRule: FilterRule = {
  name: 'continuation-lock',
  apply(candidates, ctx) {
    const me = ctx.snapshot.activeSelf;
    const moves = ctx.snapshot.availableMoves;

    if (me.effects.includes('ENCORE') && moves.length === 1 && lockedMoveUseless(ctx)) {
      return overrideWithViableSwitches(candidates, ctx, `encored into useless ${moves[0].id}`);
    }

    if (me.effects.includes('TAUNT')) {
      if (moves.length === 0) {
        return overrideWithViableSwitches(candidates, ctx, 'taunted with no attacking move');
      }
      if (moves.every((m) => effectiveness(ctx, m.id) < 1)) {
        return overrideWithViableSwitches(
          candidates,
          ctx,
          'taunted with only not very effective attacks',
        );
      }
    }
    return KEEP;
  },
};

export const specialWallRule: FilterRule = {
  name: 'special-wall',
  apply(candidates, ctx) {
    const opponent = normalizeSpecies(ctx.snapshot.activeOpponent.species);
    if (!includesMove(SPECIAL_WALLS, opponent)) return KEEP;
    if (ctx.snapshot.availableMoves.some((m) => m.category === 'PHYSICAL')) return KEEP;
    return overrideWithViableSwitches(
      candidates,
      ctx,
      `facing ${opponent} without a physical attack`,
    );
  },
};
