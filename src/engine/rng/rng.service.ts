// splitmix64 기반 결정적 RNG: 같은 배틀/턴은 같은 교체 대상을 고른다

import { Injectable } from '@nestjs/common';

const MASK_64 = 0xffffffffffffffffn;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;

export class Rng {
  private state: bigint;

  constructor(seed: string) {
    this.state = hashSeed(seed);
  }

  /** 균등 선택. 빈 배열이면 undefined */
  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.floor(this.nextFloat() * items.length)];
  }

  /** [0, 1) 실수: 상위 53비트 사용 */
  private nextFloat(): number {
    this.state = (this.state + GOLDEN_GAMMA) & MASK_64;
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
    z = (z ^ (z >> 31n)) & MASK_64;
    return Number(z >> 11n) / 2 ** 53;
  }
}

function hashSeed(seed: string): bigint {
  let h = 0n;
  for (let i = 0; i < seed.length; i++) {
    h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
  }
  return h === 0n ? 1n : h;
}

@Injectable()
export class RngService {
  /** seed `<battleId>:<turn>` */
  forTurn(battleId: string, turn: number): Rng {
    return new Rng(`${battleId}:${turn}`);
  }
}
