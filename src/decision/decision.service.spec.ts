import { DecisionService } from './decision.service.js';
import { DecisionConfigService, type DecisionConfig } from './decision-config.service.js';
import { DecisionLogService } from './decision-log.service.js';
import {
  ConstantSnapshotProvider,
  type SnapshotProvider,
} from './ports/snapshot-provider.port.js';
import type {
  DecisionAnswer,
  DecisionMakerPort,
  DecisionRequest,
} from './ports/decision-maker.port.js';
import { InMemoryBattleMemoryRepository } from '../db/repositories/in-memory-battle-memory.repository.js';
import { InMemoryDecisionLogRepository } from '../db/repositories/in-memory-decision-log.repository.js';
import type { BattleMemoryRepository } from '../db/repositories/battle-memory.repository.js';
import { NotFoundError } from '../common/errors/engine-errors.js';
import { DamageEstimatorService } from '../engine/damage/damage-estimator.service.js';
import { TurnOrderService } from '../engine/turn-order/turn-order.service.js';
import { ActionFilterService } from '../engine/filter/action-filter.service.js';
import { ViableSwitchService } from '../engine/filter/viable-switch.service.js';
import { FallbackSelectorService } from '../engine/fallback/fallback-selector.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import type { TypeChartService } from '../engine/tables/type-chart.service.js';
import { PromptBuilderService } from '../llm/prompts/prompt-builder.service.js';
import {
  loadTypeChart,
  makeMove,
  makePokemon,
  makeSnapshot,
} from '../engine/testing/battle.fixtures.js';
import type { BattleSnapshot, EngineMemory } from '../db/types/index.js';

type ScriptedAnswer = DecisionAnswer | null | Error;

/** 정해진 응답을 순서대로 돌려주는 결정자 */
class ScriptedDecisionMaker implements DecisionMakerPort {
  readonly requests: DecisionRequest[] = [];
  readonly prompts: string[] = [];
  readonly resets: string[] = [];
  readonly recorded: string[] = [];
  readonly ended: string[] = [];

  constructor(private readonly answers: ScriptedAnswer[] = []) {}

  resetConversation(battleId: string): void {
    this.resets.push(battleId);
  }

  addPrompt(_battleId: string, prompt: string): void {
    this.prompts.push(prompt);
  }

  async choose(request: DecisionRequest): Promise<DecisionAnswer | null> {
    this.requests.push(request);
    const next = this.answers.shift();
    if (next instanceof Error) throw next;
    return next ?? null;
  }

  recordChoice(_battleId: string, key: string): void {
    this.recorded.push(key);
  }

  endBattle(battleId: string): void {
    this.ended.push(battleId);
  }
}

/** 호출할 때마다 다음 스냅샷으로 넘어가고, 마지막 것에서 멈춘다 */
class SequenceSnapshotProvider implements SnapshotProvider {
  readonly live = true;
  calls = 0;

  constructor(private readonly snapshots: BattleSnapshot[]) {}

  current(): BattleSnapshot {
    const snapshot = this.snapshots[Math.min(this.calls, this.snapshots.length - 1)];
    this.calls++;
    return snapshot;
  }
}

/** 모든 호출이 실패하는 저장소 */
class BrokenMemoryRepository implements BattleMemoryRepository {
  async find(): Promise<EngineMemory | null> {
    throw new Error('connection reset');
  }

  async save(): Promise<void> {
    throw new Error('connection reset');
  }

  async delete(): Promise<boolean> {
    throw new Error('connection reset');
  }
}

function answer(text: string): DecisionAnswer {
  return { text, model: 'stub-model', latencyMs: 1 };
}

const bodySlam = makeMove({ id: 'bodyslam', basePower: 85 });
const tackle = makeMove({ id: 'tackle', basePower: 40 });
const pikachu = makePokemon({ species: 'Pikachu', types: ['ELECTRIC'] });
const onix = makePokemon({ species: 'Onix', types: ['ROCK', 'GROUND'] });

describe('DecisionService', () => {
  let typeChart: TypeChartService;
  let memoryRepo: InMemoryBattleMemoryRepository;
  let logRepo: InMemoryDecisionLogRepository;

  beforeAll(async () => {
    typeChart = await loadTypeChart();
  });

  beforeEach(() => {
    memoryRepo = new InMemoryBattleMemoryRepository();
    logRepo = new InMemoryDecisionLogRepository();
  });

  function makeService(
    decisionMaker: DecisionMakerPort,
    options: { repo?: BattleMemoryRepository; config?: Partial<DecisionConfig> } = {},
  ): DecisionService {
    const config = new DecisionConfigService();
    config.update({
      maxAttempts: 3,
      legalActionWaitMs: 5,
      pollMs: 1,
      forceSwitchWaitMs: 5,
      ...options.config,
    });
    const viableSwitch = new ViableSwitchService(typeChart);
    return new DecisionService(
      options.repo ?? memoryRepo,
      decisionMaker,
      new DamageEstimatorService(typeChart),
      new TurnOrderService(),
      new ActionFilterService(typeChart, viableSwitch),
      viableSwitch,
      new FallbackSelectorService(new RngService()),
      new PromptBuilderService(),
      config,
      new DecisionLogService(logRepo),
    );
  }

  function provider(snapshot: BattleSnapshot): ConstantSnapshotProvider {
    return new ConstantSnapshotProvider(snapshot);
  }

  it('유효한 응답은 정규화 후 채택', async () => {
    const maker = new ScriptedDecisionMaker([answer(' BodySlam!')]);
    const service = makeService(maker);

    const outcome = await service.decide(
      'battle-1',
      provider(makeSnapshot({ availableMoves: [bodySlam, tackle] })),
    );

    expect(outcome).toEqual({
      battleId: 'battle-1',
      turn: 2,
      action: { kind: 'MOVE', moveId: 'bodyslam' },
      actionKey: 'bodyslam',
      source: 'DECISION_MAKER',
      candidates: ['bodyslam', 'tackle'],
      overriddenBy: null,
    });
    expect(maker.recorded).toEqual(['bodyslam']);
    expect(maker.prompts).toHaveLength(1);
    expect(await memoryRepo.find('battle-1')).toEqual({
      lastActionTaken: 'bodyslam',
      justSwitched: false,
    });
  });

  it('세 번 모두 잘못된 응답 → 최대 기대 피해 기술', async () => {
    const maker = new ScriptedDecisionMaker([
      answer('splash'),
      answer('flamethrower'),
      answer('xyz'),
    ]);
    const service = makeService(maker);

    const outcome = await service.decide(
      'battle-1',
      provider(makeSnapshot({ availableMoves: [tackle, bodySlam] })),
    );

    expect(maker.requests).toHaveLength(3);
    expect(outcome.source).toBe('FALLBACK');
    expect(outcome.action).toEqual({ kind: 'MOVE', moveId: 'bodyslam' });

    const [log] = await service.listDecisions('battle-1', 10);
    expect(log).toEqual({
      battleId: 'battle-1',
      turn: 2,
      source: 'FALLBACK',
      actionKey: 'bodyslam',
      candidates: ['tackle', 'bodyslam'],
      overriddenBy: null,
      filterTrace: [],
      attempts: 3,
      modelUsed: 'stub-model',
      latencyMs: 1,
      rawCompletion: 'xyz',
    });
  });

  it('결정자 오류도 실패한 시도로 센다', async () => {
    const maker = new ScriptedDecisionMaker([new Error('connection refused'), answer('tackle')]);
    const service = makeService(maker);

    const outcome = await service.decide(
      'battle-1',
      provider(makeSnapshot({ availableMoves: [tackle, bodySlam] })),
    );

    expect(outcome.source).toBe('DECISION_MAKER');
    expect(outcome.actionKey).toBe('tackle');
    const [log] = await service.listDecisions('battle-1', 1);
    expect(log.attempts).toBe(2);
  });

  it('기술도 교체도 없으면 PASS', async () => {
    const maker = new ScriptedDecisionMaker();
    const service = makeService(maker);

    const outcome = await service.decide(
      'battle-1',
      provider(makeSnapshot({ availableMoves: [], availableSwitches: [] })),
    );

    expect(outcome.action).toEqual({ kind: 'PASS' });
    expect(outcome.actionKey).toBe('pass');
    expect(outcome.source).toBe('FALLBACK');
    expect(maker.requests).toHaveLength(0);
    expect(await memoryRepo.find('battle-1')).toEqual({
      lastActionTaken: null,
      justSwitched: false,
    });
  });

  it('재충전 턴은 묻지 않고 PASS', async () => {
    const maker = new ScriptedDecisionMaker([answer('bodyslam')]);
    const service = makeService(maker);

    const outcome = await service.decide(
      'battle-1',
      provider(
        makeSnapshot({
          activeSelf: makePokemon({ mustRecharge: true }),
          availableMoves: [bodySlam],
        }),
      ),
    );

    expect(outcome.action).toEqual({ kind: 'PASS' });
    expect(outcome.source).toBe('FORCED');
    expect(maker.requests).toHaveLength(0);
  });

  it('필터 규칙 기록을 결정 로그에 남긴다', async () => {
    const maker = new ScriptedDecisionMaker([answer('bodyslam')]);
    const service = makeService(maker);
    const recover = makeMove({ id: 'recover', basePower: 0, category: 'STATUS', accuracy: true });

    await service.decide(
      'battle-1',
      provider(makeSnapshot({ availableMoves: [bodySlam, recover] })),
    );

    const [log] = await service.listDecisions('battle-1', 1);
    expect(log.candidates).toEqual(['bodyslam']);
    expect(log.filterTrace).toEqual([
      {
        rule: 'redundant-recovery',
        kind: 'REMOVE',
        keys: ['recover'],
        reason: 'HP is already high',
      },
    ]);
  });

  describe('게으름(truant) 턴', () => {
    const loafing = makePokemon({ ability: 'truant', mustRecharge: true });

    it('교체할 대상이 없으면 묻지 않고 PASS', async () => {
      const maker = new ScriptedDecisionMaker([answer('bodyslam')]);
      const service = makeService(maker);

      const outcome = await service.decide(
        'battle-1',
        provider(makeSnapshot({ activeSelf: loafing, availableMoves: [bodySlam] })),
      );

      expect(outcome).toEqual({
        battleId: 'battle-1',
        turn: 2,
        action: { kind: 'PASS' },
        actionKey: 'pass',
        source: 'FORCED',
        candidates: [],
        overriddenBy: 'truant-loaf',
      });
      expect(maker.requests).toHaveLength(0);
      const [log] = await service.listDecisions('battle-1', 1);
      expect(log.filterTrace).toEqual([
        {
          rule: 'truant-loaf',
          kind: 'FORFEIT',
          keys: [],
          reason: 'truant is loafing with no switch available',
        },
      ]);
    });

    it('교체할 수 있으면 교체 후보만 묻는다', async () => {
      const maker = new ScriptedDecisionMaker([answer('switch-pikachu')]);
      const service = makeService(maker);

      const outcome = await service.decide(
        'battle-1',
        provider(
          makeSnapshot({
            activeSelf: loafing,
            availableMoves: [bodySlam],
            availableSwitches: [pikachu],
          }),
        ),
      );

      expect(maker.requests[0].candidates).toEqual(['switch-pikachu']);
      expect(outcome.source).toBe('DECISION_MAKER');
      expect(outcome.action).toEqual({ kind: 'SWITCH', species: 'Pikachu' });
      expect(outcome.overriddenBy).toBe('truant-loaf');
    });
  });

  describe('스냅샷 대기', () => {
    it('고정 스냅샷이면 대기 시간을 쓰지 않는다', async () => {
      const maker = new ScriptedDecisionMaker();
      const service = makeService(maker, {
        config: { legalActionWaitMs: 60_000, forceSwitchWaitMs: 60_000 },
      });
      const started = Date.now();

      const outcome = await service.decide(
        'battle-1',
        provider(makeSnapshot({ availableMoves: [], availableSwitches: [] })),
      );

      expect(outcome.action).toEqual({ kind: 'PASS' });
      expect(Date.now() - started).toBeLessThan(1000);
    });

    it('갱신되는 스냅샷은 기술이 나타날 때까지 다시 읽는다', async () => {
      const maker = new ScriptedDecisionMaker([answer('bodyslam')]);
      const service = makeService(maker, { config: { legalActionWaitMs: 1000, pollMs: 1 } });
      const empty = makeSnapshot({ availableMoves: [] });
      const ready = makeSnapshot({ availableMoves: [bodySlam] });
      const live = new SequenceSnapshotProvider([empty, empty, ready]);

      const outcome = await service.decide('battle-1', live);

      expect(live.calls).toBe(3);
      expect(outcome.actionKey).toBe('bodyslam');
      expect(outcome.source).toBe('DECISION_MAKER');
    });
  });

  describe('저장소 장애', () => {
    it('기억을 읽고 쓰지 못해도 행동은 커밋된다', async () => {
      const maker = new ScriptedDecisionMaker([answer('bodyslam')]);
      const service = makeService(maker, { repo: new BrokenMemoryRepository() });

      const outcome = await service.decide(
        'battle-1',
        provider(makeSnapshot({ availableMoves: [bodySlam, tackle] })),
      );

      expect(outcome.action).toEqual({ kind: 'MOVE', moveId: 'bodyslam' });
      expect(outcome.source).toBe('DECISION_MAKER');
      const [log] = await service.listDecisions('battle-1', 1);
      expect(log.actionKey).toBe('bodyslam');
    });
  });

  it('교체를 고르면 기억과 대화를 초기화', async () => {
    await memoryRepo.save('battle-1', { lastActionTaken: 'tackle', justSwitched: false });
    const maker = new ScriptedDecisionMaker([answer('switch-pikachu')]);
    const service = makeService(maker);

    const outcome = await service.decide(
      'battle-1',
      provider(makeSnapshot({ availableMoves: [bodySlam], availableSwitches: [pikachu] })),
    );

    expect(outcome.action).toEqual({ kind: 'SWITCH', species: 'Pikachu' });
    expect(outcome.candidates).toEqual(['bodyslam', 'switch-pikachu']);
    expect(maker.resets).toEqual(['battle-1']);
    expect(maker.recorded).toEqual([]);
    expect(await memoryRepo.find('battle-1')).toEqual({
      lastActionTaken: null,
      justSwitched: true,
    });
  });

  it('교체 직후 턴에는 교체 후보를 뺀다', async () => {
    await memoryRepo.save('battle-1', { lastActionTaken: null, justSwitched: true });
    const maker = new ScriptedDecisionMaker([answer('bodyslam')]);
    const service = makeService(maker);

    const outcome = await service.decide(
      'battle-1',
      provider(makeSnapshot({ availableMoves: [bodySlam], availableSwitches: [pikachu] })),
    );

    expect(outcome.candidates).toEqual(['bodyslam']);
    expect(maker.requests[0].candidates).toEqual(['bodyslam']);
    expect(await memoryRepo.find('battle-1')).toEqual({
      lastActionTaken: 'bodyslam',
      justSwitched: false,
    });
  });

  describe('강제 교체', () => {
    const opponent = makePokemon({
      species: 'Lapras',
      types: ['WATER', 'ICE'],
      revealedMoves: [makeMove({ id: 'surf', type: 'WATER', category: 'SPECIAL', basePower: 90 })],
    });
    const forced = makeSnapshot({
      activeOpponent: opponent,
      availableMoves: [],
      availableSwitches: [onix, pikachu],
      forceSwitch: true,
    });

    it('약점인 후보를 빼고 교체 프롬프트로 묻는다', async () => {
      const maker = new ScriptedDecisionMaker([answer('switch-pikachu')]);
      const service = makeService(maker);

      const outcome = await service.decide('battle-1', provider(forced));

      expect(outcome.source).toBe('DECISION_MAKER');
      expect(outcome.action).toEqual({ kind: 'SWITCH', species: 'Pikachu' });
      expect(outcome.candidates).toEqual(['switch-pikachu']);
      expect(maker.prompts[0].split('\n')).toContain(
        'Your ONLY available team members are: switch-pikachu',
      );
      // 질의 전 초기화 + 교체 커밋 시 초기화
      expect(maker.resets).toEqual(['battle-1', 'battle-1']);
      expect(await memoryRepo.find('battle-1')).toEqual({
        lastActionTaken: null,
        justSwitched: true,
      });
    });

    it('응답이 없으면 무작위 합법 교체', async () => {
      const maker = new ScriptedDecisionMaker();
      const service = makeService(maker);

      const outcome = await service.decide(
        'battle-1',
        provider({ ...forced, availableSwitches: [pikachu] }),
      );

      expect(maker.requests).toHaveLength(3);
      expect(outcome.source).toBe('FALLBACK');
      expect(outcome.action).toEqual({ kind: 'SWITCH', species: 'Pikachu' });
    });

    it('직접 교체 직후 풀리지 않는 forceSwitch → fallback', async () => {
      await memoryRepo.save('battle-1', { lastActionTaken: null, justSwitched: true });
      const maker = new ScriptedDecisionMaker();
      const service = makeService(maker);

      const outcome = await service.decide(
        'battle-1',
        provider({ ...forced, availableMoves: [bodySlam], availableSwitches: [] }),
      );

      expect(maker.requests).toHaveLength(0);
      expect(outcome.source).toBe('FALLBACK');
      expect(outcome.action).toEqual({ kind: 'MOVE', moveId: 'bodyslam' });
    });
  });

  describe('기억 조회/삭제', () => {
    it('처음 보는 배틀은 NotFound', async () => {
      const service = makeService(new ScriptedDecisionMaker());
      await expect(service.getMemory('unknown')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('삭제하면 대화도 끝낸다', async () => {
      const maker = new ScriptedDecisionMaker([answer('bodyslam')]);
      const service = makeService(maker);
      await service.decide('battle-1', provider(makeSnapshot({ availableMoves: [bodySlam] })));

      expect(await service.forgetBattle('battle-1')).toEqual({
        battleId: 'battle-1',
        deleted: true,
      });
      expect(maker.ended).toEqual(['battle-1']);
      await expect(service.forgetBattle('battle-1')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('기억이 없는 배틀도 대화는 버린다', async () => {
      const maker = new ScriptedDecisionMaker();
      const service = makeService(maker);

      await expect(service.forgetBattle('unknown')).rejects.toBeInstanceOf(NotFoundError);
      expect(maker.ended).toEqual(['unknown']);
    });
  });
});
