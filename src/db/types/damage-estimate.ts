export type MoveDamageInfo = {
  expectedDamage: number;
  isStab: boolean;
  effectivenessMultiplier: number;
  priority: number;
};

/** moveId → 추정치. availableMoves 순서를 유지한다 */
export type DamageEstimate = ReadonlyMap<string, MoveDamageInfo>;
