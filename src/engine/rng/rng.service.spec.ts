import { RngService } from './rng.service.js';

const TEAM = Array.from({ length: 100 }, (_, i) => `member-${i}`);

describe('RngService.forTurn', () => {
  let service: RngService;

  beforeEach(() => {
    service = new RngService();
  });

  function draw(battleId: string, turn: number, count = 20): (string | undefined)[] {
    const rng = service.forTurn(battleId, turn);
    return Array.from({ length: count }, () => rng.pick(TEAM));
  }

  it('같은 배틀/턴 → 같은 선택 순서', () => {
    expect(draw('battle-1', 7)).toEqual(draw('battle-1', 7));
  });

  it('다른 턴 → 다른 순서', () => {
    expect(draw('battle-1', 7)).not.toEqual(draw('battle-1', 8));
  });

  it('다른 배틀 → 다른 순서', () => {
    expect(draw('battle-1', 7)).not.toEqual(draw('battle-2', 7));
  });

  it('pick: 빈 배열 → undefined', () => {
    expect(service.forTurn('battle-1', 1).pick([])).toBeUndefined();
  });

  it('pick: 원소가 하나면 항상 그 원소', () => {
    const rng = service.forTurn('battle-1', 1);
    for (let i = 0; i < 10; i++) {
      expect(rng.pick(['pikachu'])).toBe('pikachu');
    }
  });

  it('pick: 모든 원소가 선택될 수 있다', () => {
    const rng = service.forTurn('battle-dist', 3);
    const seen = new Set<number>();
    for (let i = 0; i < 300; i++) {
      const v = rng.pick([0, 1, 2, 3]);
      if (v !== undefined) seen.add(v);
    }
    expect(seen.size).toBe(4);
  });
});
