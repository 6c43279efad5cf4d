// 턴 프롬프트 조립: 상태 요약 + 후보별 주석 + 닫힌 선택지 목록

import { Injectable } from '@nestjs/common';
import type {
  ActionCandidate,
  BattleSnapshot,
  DamageEstimate,
  EngineMemory,
  PokemonView,
  SideConditions,
  SwitchAction,
} from '../../db/types/index.js';
import { actionKey } from '../../common/action-keys.js';

const STACKED_CONDITIONS = ['SPIKES', 'TOXIC_SPIKES'];

/** 'ELECTRIC_TERRAIN' → 'Electric Terrain' */
export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function statusText(pokemon: PokemonView): string {
  return pokemon.status ? titleCase(pokemon.status) : 'Healthy';
}

function hpText(pokemon: PokemonView): string {
  return `${(pokemon.hpFraction * 100).toFixed(1)}%`;
}

function sideText(conditions: SideConditions): string {
  const parts = Object.entries(conditions)
    .filter(([, count]) => (count ?? 0) > 0)
    .map(([condition, count]) =>
      STACKED_CONDITIONS.includes(condition)
        ? `${titleCase(condition)} (x${count})`
        : titleCase(condition),
    );
  return parts.length > 0 ? parts.join(', ') : 'None';
}

@Injectable()
export class PromptBuilderService {
  /** 날씨/필드/양 진영 설치물 요약 */
  buildConditionsSummary(snapshot: BattleSnapshot): string {
    const fields = snapshot.fieldConditions.map(titleCase).join(', ') || 'None';
    return [
      '--- Battle State ---',
      `Weather: ${snapshot.weather ? titleCase(snapshot.weather) : 'No weather'}`,
      `Field Effects: ${fields}`,
      `Your Side: ${sideText(snapshot.sideConditionsSelf)}`,
      `Opponent's Side: ${sideText(snapshot.sideConditionsOpponent)}`,
    ].join('\n');
  }

  /** 후보 하나를 'id (Expected Damage: 60.0, STAB, ...)' 형태로 */
  annotate(candidate: ActionCandidate, damage: DamageEstimate): string {
    const key = actionKey(candidate);
    if (candidate.kind === 'SWITCH') return key;

    const info = damage.get(candidate.moveId);
    if (!info) return key;

    const details: string[] = [];
    if (info.expectedDamage > 0) {
      details.push(`Expected Damage: ${info.expectedDamage.toFixed(1)}`);
    }
    if (info.isStab) details.push('STAB');
    const multiplier = info.effectivenessMultiplier;
    if (multiplier > 1) {
      details.push(`${multiplier.toFixed(1)}x Super Effective`);
    } else if (multiplier > 0 && multiplier < 1) {
      details.push(`${multiplier.toFixed(1)}x Not Very Effective`);
    } else if (multiplier === 0) {
      details.push('No Effect');
    }
    if (info.priority > 0) details.push('Priority');

    return details.length > 0 ? `${key} (${details.join(', ')})` : key;
  }

  buildTurnPrompt(
    snapshot: BattleSnapshot,
    candidates: readonly ActionCandidate[],
    damage: DamageEstimate,
    memory: EngineMemory,
  ): string {
    const self = snapshot.activeSelf;
    const opponent = snapshot.activeOpponent;
    const lastMove = memory.lastActionTaken;
    const actions = candidates.map((c) => this.annotate(c, damage));

    const lines = [
      lastMove
        ? `Last turn you used '${lastMove}'.`
        : 'This is the first turn for this Pokémon.',
      ...(lastMove
        ? [`DO NOT repeatedly use the move: ${lastMove} UNLESS it is the optimal move to use.`]
        : []),
      `Your active Pokémon: ${self.species} (HP: ${hpText(self)}) (Status: ${statusText(self)})`,
      `Opponent's active Pokémon: ${opponent.species} (HP: ${hpText(opponent)}) (Status: ${statusText(opponent)})`,
      'Choose a MOVE or a tactical SWITCH.',
      `Switch if your moves against ${opponent.species} are not very effective AND they have super effective moves against your ${self.species}.`,
      "To switch to a different Pokémon, choose an action starting with 'switch-'.",
      `Your ONLY available actions are: ${actions.join(', ')}`,
      'If selecting a damaging move, PRIORITIZE moves that are Super Effective and have STAB.',
      'Any other action not in the list is invalid. Your response must be a single, exact, lowercase name from the list.',
      this.buildConditionsSummary(snapshot),
    ];
    return lines.join('\n');
  }

  /** 기절 후 교체: 팀원만 나열 */
  buildReplacementPrompt(
    snapshot: BattleSnapshot,
    candidates: readonly SwitchAction[],
  ): string {
    const self = snapshot.activeSelf;
    const opponent = snapshot.activeOpponent;
    const members = candidates.map((c) => actionKey(c));

    return [
      'You MUST choose a replacement from ONLY below list.',
      `Opponent's active Pokémon: ${opponent.species} (HP: ${hpText(opponent)}) (Status: ${statusText(opponent)})`,
      `Your ONLY available team members are: ${members.join(', ')}`,
      `Switch to a Pokémon that has super effective moves against ${opponent.species} or that resists the moves ${opponent.species} used against ${self.species}.`,
      'Any other Pokémon not in the list has fainted or is unavailable. Respond with a single action from the list.',
      this.buildConditionsSummary(snapshot),
    ].join('\n');
  }
}
