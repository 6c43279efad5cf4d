import { actionKey } from '../../../common/action-keys.js';
import type { FilterRule } from '../filter.types.js';
import { KEEP, switchCandidates } from './rule-helpers.js';

export const viableSwitchRule: FilterRule = {
  name: 'viable-switch',
  apply(candidates, ctx) {
    const viable = new Set(ctx.viableSwitches(candidates).map(actionKey));
    const keys = switchCandidates(candidates)
      .map(actionKey)
      .filter((key) => !viable.has(key));
    return keys.length > 0
      ? { kind: 'REMOVE', keys, reason: 'weak to the opponent' }
      : KEEP;
  },
};
