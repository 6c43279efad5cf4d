// 상태이상/변화 기술 관련 규칙

import type { ActionCandidate } from '../../../db/types/index.js';
import {
  OPPONENT_VOLATILE_MOVES,
  PARALYSIS_MOVES,
  POISON_MOVES,
  POWDER_MOVES,
  SELF_VOLATILE_MOVES,
  SLEEP_MOVES,
  STATUS_INFLICTING_MOVES,
  TRAPPING_EFFECTS,
  TRAPPING_MOVES,
  WAKE_UP_MOVES,
} from '../../tables/move-lists.js';
import type { FilterRule } from '../filter.types.js';
import {
  KEEP,
  override,
  removeMoves,
  removeMovesWhere,
  switchCandidates,
} from './rule-helpers.js';

export const sleepCapRule: FilterRule = {
  name: 'sleep-cap',
  apply(candidates, ctx) {
    const { teamOpponent, activeOpponent } = ctx.snapshot;
    const anyAsleep =
      activeOpponent.status === 'SLP' ||
      Object.values(teamOpponent).some((p) => p.status === 'SLP');
    if (!anyAsleep) return KEEP;
    return removeMoves(candidates, SLEEP_MOVES, 'an opposing pokemon is already asleep');
  },
};

export const redundantVolatileRule: FilterRule = {
  name: 'redundant-volatile',
  apply(candidates, ctx) {
    const opponentEffects = ctx.snapshot.activeOpponent.effects;
    const selfEffects = ctx.snapshot.activeSelf.effects;
    const redundant: string[] = [];

    for (const [moveId, effect] of Object.entries(OPPONENT_VOLATILE_MOVES)) {
      if (opponentEffects.includes(effect)) redundant.push(moveId);
    }
    if (TRAPPING_EFFECTS.some((e) => opponentEffects.includes(e))) {
      redundant.push(...TRAPPING_MOVES);
    }
    for (const [moveId, effect] of Object.entries(SELF_VOLATILE_MOVES)) {
      if (selfEffects.includes(effect)) redundant.push(moveId);
    }
    return removeMoves(candidates, redundant, 'effect already in place');
  },
};

export const sleepHandlingRule: FilterRule = {
  name: 'sleep-handling',
  apply(candidates, ctx) {
    const me = ctx.snapshot.activeSelf;
    if (me.status !== 'SLP') {
      return removeMoves(candidates, WAKE_UP_MOVES, 'not asleep');
    }

    const switches = switchCandidates(candidates);
    if (me.statusCounter > 1) {
      return override(switches, `asleep for ${me.statusCounter} more turns`);
    }
    if (ctx.snapshot.availableMoves.some((m) => m.id === 'sleeptalk')) {
      const sleepTalk: ActionCandidate = { kind: 'MOVE', moveId: 'sleeptalk' };
      return override([sleepTalk, ...switches], 'asleep, sleeptalk available');
    }
    return override(switches, 'asleep without sleeptalk');
  },
};

export const statusRedundancyRule: FilterRule = {
  name: 'status-redundancy',
  apply(candidates, ctx) {
    const { activeOpponent: opponent, activeSelf: me, generation } = ctx.snapshot;
    const types = opponent.types;
    const abilities = opponent.ability ? [opponent.ability] : opponent.possibleAbilities;
    const useless: string[] = [];

    if (opponent.status !== null) useless.push(...STATUS_INFLICTING_MOVES);

    // 타입 면역
    if ((types.includes('ELECTRIC') && generation >= 6) || types.includes('GROUND')) {
      useless.push('thunderwave');
    }
    if (types.includes('FIRE')) useless.push('willowisp');
    if ((types.includes('POISON') || types.includes('STEEL')) && me.ability !== 'corrosion') {
      useless.push(...POISON_MOVES);
    }
    if (types.includes('GRASS')) useless.push('leechseed');

    // 특성 면역 (미공개면 후보 특성 전부 고려)
    if (abilities.includes('overcoat') || (types.includes('GRASS') && generation >= 6)) {
      useless.push(...POWDER_MOVES);
    }
    if (abilities.includes('insomnia') || abilities.includes('vitalspirit')) {
      useless.push(...SLEEP_MOVES);
    }
    if (abilities.includes('waterveil')) useless.push('willowisp');
    if (abilities.includes('limber') || (types.includes('ELECTRIC') && generation >= 6)) {
      useless.push(...PARALYSIS_MOVES);
    }
    if (abilities.includes('oblivious') && generation >= 6) useless.push('taunt');

    return removeMoves(candidates, useless, 'opponent is statused or immune');
  },
};

export const substituteRule: FilterRule = {
  name: 'substitute',
  apply(candidates, ctx) {
    if (ctx.snapshot.activeOpponent.effects.includes('SUBSTITUTE')) {
      return removeMovesWhere(
        candidates,
        ctx,
        (m) => m.category === 'STATUS',
        'opponent is behind a substitute',
      );
    }
    if (ctx.snapshot.activeSelf.effects.includes('SUBSTITUTE')) {
      return removeMoves(candidates, ['substitute'], 'substitute already up');
    }
    return KEEP;
  },
};

export const pranksterDarkRule: FilterRule = {
  name: 'prankster-dark',
  apply(candidates, ctx) {
    const { activeSelf, activeOpponent, generation } = ctx.snapshot;
    if (activeSelf.ability !== 'prankster' || generation < 7) return KEEP;
    if (!activeOpponent.types.includes('DARK')) return KEEP;
    return removeMovesWhere(
      candidates,
      ctx,
      (m) => m.category === 'STATUS',
      'prankster status moves fail against dark types',
    );
  },
};
