import type { ActionCandidate, CommittedAction } from '../db/types/index.js';

const SWITCH_PREFIX = 'switch-';

/** 'Mr. Mime' → 'mr-mime' */
export function normalizeSpecies(species: string): string {
  return species
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '-')
    .replace(/[^a-z-]/g, '');
}

export function switchKey(species: string): string {
  return `${SWITCH_PREFIX}${normalizeSpecies(species)}`;
}

/** 후보 식별자: 기술 id 또는 'switch-<species>' */
export function actionKey(action: ActionCandidate): string {
  return action.kind === 'MOVE' ? action.moveId : switchKey(action.species);
}

export function describeAction(action: CommittedAction): string {
  return action.kind === 'PASS' ? 'pass' : actionKey(action);
}

/**
 * 결정자 응답 정규화: 소문자, 알파벳과 하이픈만 남긴다.
 */
export function sanitizeChoice(text: string): string {
  return text.trim().toLowerCase().replace(/[^a-z-]/g, '');
}
