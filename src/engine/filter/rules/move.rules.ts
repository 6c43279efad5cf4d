// 기술 단위 제거 규칙: 회복, 랭크업, 반복, 희생기 등

import {
  CLERIC_MOVES,
  HEALING_MOVES,
  ITEM_SWAP_MOVES,
  ONCE_PER_CYCLE_MOVES,
  PIVOT_MOVES,
  PROTECT_MOVES,
  RECHARGE_MOVES,
  SELF_KO_MOVES,
  SETUP_SATURATION,
  includesMove,
} from '../../tables/move-lists.js';
import type { FilterRule } from '../filter.types.js';
import {
  KEEP,
  LOW_DAMAGE,
  effectiveness,
  expectedDamage,
  hasMove,
  removeMoves,
  removeMovesWhere,
} from './rule-helpers.js';

export const redundantRecoveryRule: FilterRule = {
  name: 'redundant-recovery',
  apply(candidates, ctx) {
    if (ctx.snapshot.activeSelf.hpFraction < 0.66) return KEEP;
    return removeMoves(candidates, HEALING_MOVES, 'HP is already high');
  },
};

export const saturatedBoostRule: FilterRule = {
  name: 'saturated-boost',
  apply(candidates, ctx) {
    const me = ctx.snapshot.activeSelf;
    const saturated = Object.entries(SETUP_SATURATION)
      .filter(([, isSaturated]) => isSaturated(me.boosts))
      .map(([moveId]) => moveId);

    if (
      !me.types.includes('GHOST') &&
      (me.boosts.atk ?? 0) >= 1 &&
      (me.boosts.def ?? 0) >= 1
    ) {
      saturated.push('curse');
    }
    return removeMoves(candidates, saturated, 'stats already boosted');
  },
};

export const ineffectiveAttackRule: FilterRule = {
  name: 'ineffective-attack',
  apply(candidates, ctx) {
    return removeMovesWhere(
      candidates,
      ctx,
      (m) =>
        m.category !== 'STATUS' &&
        (effectiveness(ctx, m.id) === 0 || expectedDamage(ctx, m.id) <= LOW_DAMAGE),
      'no effect or too little damage',
    );
  },
};

export const itemDependentRule: FilterRule = {
  name: 'item-dependent',
  apply(candidates, ctx) {
    const { activeSelf, activeOpponent } = ctx.snapshot;
    const useless: string[] = [];

    if (activeSelf.item === null || activeOpponent.ability === 'stickyhold') {
      useless.push(...ITEM_SWAP_MOVES);
    }
    if (
      hasMove(candidates, 'knockoff') &&
      activeOpponent.item === null &&
      effectiveness(ctx, 'knockoff') <= 1
    ) {
      useless.push('knockoff');
    }
    return removeMoves(candidates, useless, 'no item to swap or remove');
  },
};

export const repeatGuardRule: FilterRule = {
  name: 'repeat-guard',
  apply(candidates, ctx) {
    const last = ctx.memory.lastActionTaken;
    if (last === null) return KEEP;

    if (includesMove(ONCE_PER_CYCLE_MOVES, last)) {
      return removeMoves(candidates, [last], `${last} was used last turn`);
    }
    if (includesMove(PROTECT_MOVES, last)) {
      return removeMoves(candidates, PROTECT_MOVES, `${last} was used last turn`);
    }
    return KEEP;
  },
};

export const painSplitRule: FilterRule = {
  name: 'pain-split',
  apply(candidates, ctx) {
    const { activeSelf, activeOpponent } = ctx.snapshot;
    if (activeSelf.hpFraction < activeOpponent.hpFraction) return KEEP;
    return removeMoves(candidates, ['painsplit'], 'HP is not below the opponent');
  },
};

export const lastPokemonPivotRule: FilterRule = {
  name: 'last-pokemon-pivot',
  apply(candidates, ctx) {
    const { teamSelf, activeSelf } = ctx.snapshot;
    const healthyTeammates = Object.values(teamSelf).filter(
      (p) => p.species !== activeSelf.species && !p.fainted,
    );
    if (healthyTeammates.length > 0) return KEEP;
    return removeMoves(candidates, PIVOT_MOVES, 'no teammate left to pivot into');
  },
};

export const rechargeMoveRule: FilterRule = {
  name: 'recharge-move',
  apply(candidates) {
    return removeMoves(candidates, RECHARGE_MOVES, 'requires a recharge turn');
  },
};

export const selfSacrificeRule: FilterRule = {
  name: 'self-sacrifice',
  apply(candidates, ctx) {
    const { activeSelf, activeOpponent } = ctx.snapshot;
    if (activeSelf.hpFraction < 0.34 && activeOpponent.hpFraction > 0.66) return KEEP;
    return removeMoves(candidates, SELF_KO_MOVES, 'not a favourable trade');
  },
};

export const supportGatingRule: FilterRule = {
  name: 'support-gating',
  apply(candidates, ctx) {
    const { teamSelf, activeSelf } = ctx.snapshot;
    const team = [activeSelf, ...Object.values(teamSelf)];
    if (team.some((p) => !p.fainted && p.status !== null)) return KEEP;
    return removeMoves(candidates, CLERIC_MOVES, 'no teammate is statused');
  },
};
