// 규칙 실행 순서. 앞선 override 가 뒤 규칙을 모두 건너뛴다

import type { FilterRule } from '../filter.types.js';
import {
  saturatedFieldRule,
  uselessHazardRemovalRule,
  weatherDependentRule,
} from './field.rules.js';
import {
  ineffectiveAttackRule,
  itemDependentRule,
  lastPokemonPivotRule,
  painSplitRule,
  rechargeMoveRule,
  redundantRecoveryRule,
  repeatGuardRule,
  saturatedBoostRule,
  selfSacrificeRule,
  supportGatingRule,
} from './move.rules.js';
import {
  pranksterDarkRule,
  redundantVolatileRule,
  sleepCapRule,
  sleepHandlingRule,
  statusRedundancyRule,
  substituteRule,
} from './status.rules.js';
import {
  continuationLockRule,
  lockedPoorMoveRule,
  mortalPerilRule,
  offenseCollapseRule,
  specialWallRule,
  stepOnThroatRule,
  truantLoafRule,
} from './survival.rules.js';
import { viableSwitchRule } from './switch.rules.js';

export const FILTER_RULES: readonly FilterRule[] = [
  mortalPerilRule,
  stepOnThroatRule,
  redundantRecoveryRule,
  saturatedFieldRule,
  uselessHazardRemovalRule,
  saturatedBoostRule,
  lockedPoorMoveRule,
  ineffectiveAttackRule,
  sleepCapRule,
  redundantVolatileRule,
  sleepHandlingRule,
  itemDependentRule,
  repeatGuardRule,
  statusRedundancyRule,
  painSplitRule,
  offenseCollapseRule,
  substituteRule,
  pranksterDarkRule,
  truantLoafRule,
  lastPokemonPivotRule,
  weatherDependentRule,
  rechargeMoveRule,
  continuationLockRule,
  specialWallRule,
  selfSacrificeRule,
  supportGatingRule,
  viableSwitchRule,
];
