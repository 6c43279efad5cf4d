// 턴 결정 오케스트레이션: 스냅샷 → 피해 추정 → 순서 → 필터 → 결정자 → fallback → 커밋

import { setTimeout as sleep } from 'node:timers/promises';
import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  ActionCandidate,
  BattleSnapshot,
  CommittedAction,
  DamageEstimate,
  DecisionSource,
  EngineMemory,
  FilterTraceEntry,
  SwitchAction,
} from '../db/types/index.js';
import { INITIAL_ENGINE_MEMORY } from '../db/types/index.js';
import {
  BATTLE_MEMORY_REPOSITORY,
  type BattleMemoryRepository,
} from '../db/repositories/battle-memory.repository.js';
import type { DecisionLogRecord } from '../db/repositories/decision-log.repository.js';
import { actionKey, describeAction, sanitizeChoice } from '../common/action-keys.js';
import { NotFoundError } from '../common/errors/engine-errors.js';
import { DamageEstimatorService } from '../engine/damage/damage-estimator.service.js';
import { TurnOrderService } from '../engine/turn-order/turn-order.service.js';
import {
  ActionFilterService,
  legalCandidates,
} from '../engine/filter/action-filter.service.js';
import { ViableSwitchService } from '../engine/filter/viable-switch.service.js';
import { FallbackSelectorService } from '../engine/fallback/fallback-selector.service.js';
import { PromptBuilderService } from '../llm/prompts/prompt-builder.service.js';
import { DecisionConfigService } from './decision-config.service.js';
import { DecisionLogService } from './decision-log.service.js';
import {
  DECISION_MAKER,
  type DecisionAnswer,
  type DecisionMakerPort,
} from './ports/decision-maker.port.js';
import type { SnapshotProvider } from './ports/snapshot-provider.port.js';

export interface DecisionOutcome {
  battleId: string;
  turn: number;
  action: CommittedAction;
  actionKey: string;
  source: DecisionSource;
  /** 결정자에게 제시된 (또는 제시될) 후보 키 */
  candidates: string[];
  overriddenBy: string | null;
}

interface AskResult {
  key: string | null;
  attempts: number;
  lastAnswer: DecisionAnswer | null;
}

/** 한 턴의 작업 상태. 커밋 전까지 아무것도 저장하지 않는다 */
interface TurnState {
  battleId: string;
  snapshot: BattleSnapshot;
  memory: EngineMemory;
  candidates: string[];
  overriddenBy: string | null;
  trace: FilterTraceEntry[];
  ask: AskResult | null;
}

const NO_ANSWER: AskResult = { key: null, attempts: 0, lastAnswer: null };

@Injectable()
export class DecisionService {
  private readonly logger = new Logger(DecisionService.name);

  constructor(
    @Inject(BATTLE_MEMORY_REPOSITORY) private readonly memoryRepo: BattleMemoryRepository,
    @Inject(DECISION_MAKER) private readonly decisionMaker: DecisionMakerPort,
    private readonly damageEstimator: DamageEstimatorService,
    private readonly turnOrder: TurnOrderService,
    private readonly actionFilter: ActionFilterService,
    private readonly viableSwitch: ViableSwitchService,
    private readonly fallback: FallbackSelectorService,
    private readonly promptBuilder: PromptBuilderService,
    private readonly config: DecisionConfigService,
    private readonly decisionLog: DecisionLogService,
  ) {}

  async decide(battleId: string, provider: SnapshotProvider): Promise<DecisionOutcome> {
    const memory = await this.loadMemory(battleId);
    let snapshot = provider.current();
    const state = (s: BattleSnapshot): TurnState => ({
      battleId,
      snapshot: s,
      memory,
      candidates: [],
      overriddenBy: null,
      trace: [],
      ask: null,
    });

    // 재충전 턴은 선택권이 없다. 게으름(truant) 턴은 교체할 수 있으니 필터로 보낸다
    const me = snapshot.activeSelf;
    if (me.mustRecharge && me.ability !== 'truant') {
      this.logger.log(`[DECISION] ${battleId} turn ${snapshot.turn}: recharging`);
      return this.commit(state(snapshot), { kind: 'PASS' }, 'FORCED');
    }

    if (snapshot.forceSwitch) {
      if (!memory.justSwitched) {
        return this.forcedReplacement(state(snapshot));
      }
      // 직접 교체한 직후의 forceSwitch 는 대개 지난 상태가 남은 것
      snapshot = await this.waitFor(
        provider,
        (s) => !s.forceSwitch,
        this.config.get().forceSwitchWaitMs,
      );
      if (snapshot.forceSwitch) {
        this.logger.warn(`[DECISION] ${battleId}: forceSwitch did not clear after our switch`);
        return this.commitFallback(state(snapshot), this.damageEstimator.estimate(snapshot));
      }
    }

    snapshot = await this.waitFor(
      provider,
      (s) => s.availableMoves.length > 0 || s.forceSwitch,
      this.config.get().legalActionWaitMs,
    );
    if (snapshot.availableMoves.length === 0) {
      const waited = provider.live ? ` after ${this.config.get().legalActionWaitMs}ms` : '';
      this.logger.warn(`[DECISION] ${battleId}: no moves available${waited}`);
    }

    return this.chooseAction(state(snapshot));
  }

  async getMemory(battleId: string): Promise<EngineMemory> {
    const memory = await this.memoryRepo.find(battleId);
    if (!memory) {
      throw new NotFoundError(`No memory for battle ${battleId}`, { battleId });
    }
    return memory;
  }

  /** 끝난 배틀의 기억과 대화를 지운다 */
  async forgetBattle(battleId: string): Promise<{ battleId: string; deleted: true }> {
    // 기억이 없어도 대화는 버린다
    this.decisionMaker.endBattle(battleId);
    const deleted = await this.memoryRepo.delete(battleId);
    if (!deleted) {
      throw new NotFoundError(`No memory for battle ${battleId}`, { battleId });
    }
    return { battleId, deleted: true };
  }

  listDecisions(battleId: string, limit: number): Promise<DecisionLogRecord[]> {
    return this.decisionLog.list(battleId, limit);
  }

  private async chooseAction(state: TurnState): Promise<DecisionOutcome> {
    const { battleId, snapshot, memory } = state;
    const damage = this.damageEstimator.estimate(snapshot, memory.lastActionTaken);
    const order = this.turnOrder.resolve(snapshot);
    const result = this.actionFilter.run(
      snapshot,
      legalCandidates(snapshot),
      damage,
      order,
      memory,
    );
    state.overriddenBy = result.overriddenBy;
    state.trace = result.trace;
    if (result.forfeit) {
      return this.commit(state, { kind: 'PASS' }, 'FORCED');
    }

    let candidates: ActionCandidate[] = result.candidates;
    if (memory.justSwitched) {
      // 교체 직후 턴에는 다시 교체하지 않는다
      candidates = candidates.filter((c) => c.kind !== 'SWITCH');
      memory.justSwitched = false;
    }
    state.candidates = candidates.map(actionKey);

    if (candidates.length === 0) {
      this.logger.warn(`[DECISION] ${battleId}: no candidates left after filtering`);
      return this.commitFallback(state, damage);
    }

    if (candidates.every((c) => c.kind === 'SWITCH')) {
      this.decisionMaker.resetConversation(battleId);
    }
    this.decisionMaker.addPrompt(
      battleId,
      this.promptBuilder.buildTurnPrompt(snapshot, candidates, damage, memory),
    );

    state.ask = await this.ask(battleId, state.candidates);
    const chosen = candidates.find((c) => actionKey(c) === state.ask?.key);
    if (!chosen) {
      return this.commitFallback(state, damage);
    }
    return this.commit(state, chosen, 'DECISION_MAKER');
  }

  /** 기절 후 교체: 결정자에게 교체 대상만 묻는다 */
  private async forcedReplacement(state: TurnState): Promise<DecisionOutcome> {
    const { battleId, snapshot } = state;
    const damage = this.damageEstimator.estimate(snapshot, state.memory.lastActionTaken);
    const switches = snapshot.availableSwitches.map(
      (p): SwitchAction => ({ kind: 'SWITCH', species: p.species }),
    );
    const viable = this.viableSwitch.filterCandidates(switches, snapshot);
    state.candidates = viable.map(actionKey);

    if (viable.length === 0) {
      this.logger.warn(`[DECISION] ${battleId}: forced switch with no switch available`);
      return this.commitFallback(state, damage);
    }

    this.decisionMaker.resetConversation(battleId);
    this.decisionMaker.addPrompt(
      battleId,
      this.promptBuilder.buildReplacementPrompt(snapshot, viable),
    );
    state.ask = await this.ask(battleId, state.candidates);

    const chosen = viable.find((c) => actionKey(c) === state.ask?.key);
    if (chosen) {
      return this.commit(state, chosen, 'DECISION_MAKER');
    }
    const random = this.fallback.randomSwitch(snapshot, battleId);
    if (random) {
      return this.commit(state, random, 'FALLBACK');
    }
    return this.commitFallback(state, damage);
  }

  /** 유효한 키가 나올 때까지 최대 maxAttempts 회 질의 */
  private async ask(battleId: string, keys: readonly string[]): Promise<AskResult> {
    const maxAttempts = this.config.get().maxAttempts;
    let lastAnswer: DecisionAnswer | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let answer: DecisionAnswer | null;
      try {
        answer = await this.decisionMaker.choose({ battleId, candidates: keys });
      } catch (err) {
        this.logger.warn(
          `[DECISION] ${battleId}: decision-maker error on attempt ${attempt}: ${String(err)}`,
        );
        continue;
      }
      if (!answer) {
        this.logger.warn(`[DECISION] ${battleId}: no answer on attempt ${attempt}`);
        continue;
      }

      lastAnswer = answer;
      const choice = sanitizeChoice(answer.text);
      if (keys.includes(choice)) {
        return { key: choice, attempts: attempt, lastAnswer };
      }
      this.logger.warn(
        `[DECISION] ${battleId}: invalid answer "${choice}" on attempt ${attempt} (valid: ${keys.join(', ')})`,
      );
    }
    return { key: null, attempts: maxAttempts, lastAnswer };
  }

  private commitFallback(state: TurnState, damage: DamageEstimate): Promise<DecisionOutcome> {
    const choice = this.fallback.select(state.snapshot, damage, state.battleId);
    return this.commit(state, choice.action, 'FALLBACK');
  }

  private async commit(
    state: TurnState,
    action: CommittedAction,
    source: DecisionSource,
  ): Promise<DecisionOutcome> {
    const { battleId, snapshot, memory } = state;

    if (action.kind === 'MOVE') {
      memory.lastActionTaken = action.moveId;
      this.decisionMaker.recordChoice(battleId, action.moveId);
    } else if (action.kind === 'SWITCH') {
      memory.lastActionTaken = null;
      memory.justSwitched = true;
      this.decisionMaker.resetConversation(battleId);
    }
    await this.saveMemory(battleId, memory);

    const key = describeAction(action);
    const ask = state.ask ?? NO_ANSWER;
    await this.decisionLog.record({
      battleId,
      turn: snapshot.turn,
      source,
      actionKey: key,
      candidates: state.candidates,
      overriddenBy: state.overriddenBy,
      filterTrace: state.trace,
      attempts: ask.attempts,
      modelUsed: ask.lastAnswer?.model ?? null,
      latencyMs: ask.lastAnswer?.latencyMs ?? null,
      rawCompletion: ask.lastAnswer?.text ?? null,
    });

    this.logger.log(`[DECISION] ${battleId} turn ${snapshot.turn}: ${key} (${source})`);
    return {
      battleId,
      turn: snapshot.turn,
      action,
      actionKey: key,
      source,
      candidates: state.candidates,
      overriddenBy: state.overriddenBy,
    };
  }

  /** 저장소 오류로 결정을 멈추지 않는다: 처음 보는 배틀처럼 시작 */
  private async loadMemory(battleId: string): Promise<EngineMemory> {
    try {
      return { ...((await this.memoryRepo.find(battleId)) ?? INITIAL_ENGINE_MEMORY) };
    } catch (err) {
      this.logger.error(
        `[DECISION] ${battleId}: failed to load memory, starting fresh`,
        err instanceof Error ? err.stack : String(err),
      );
      return { ...INITIAL_ENGINE_MEMORY };
    }
  }

  private async saveMemory(battleId: string, memory: EngineMemory): Promise<void> {
    try {
      await this.memoryRepo.save(battleId, memory);
    } catch (err) {
      this.logger.error(
        `[DECISION] ${battleId}: failed to save memory`,
        err instanceof Error ? err.stack : String(err),
      );
    }
  }

  /** 조건이 맞거나 시간이 다 될 때까지 스냅샷을 다시 읽는다. 고정 스냅샷이면 바로 돌려준다 */
  private async waitFor(
    provider: SnapshotProvider,
    ready: (snapshot: BattleSnapshot) => boolean,
    timeoutMs: number,
  ): Promise<BattleSnapshot> {
    let snapshot = provider.current();
    if (!provider.live) return snapshot;

    const pollMs = this.config.get().pollMs;
    let waited = 0;
    while (!ready(snapshot) && waited < timeoutMs) {
      await sleep(pollMs);
      waited += pollMs;
      snapshot = provider.current();
    }
    return snapshot;
  }
}
