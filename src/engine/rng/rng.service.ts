// splitmix64 기반 결정적 RNG: 모든 확률 판정은 주입된 RandomSource 를 거친다

import { Injectable } from '@nestjs/common';

export interface RngState {
  seed: string;
  cursor: number;
}

/** 전투/제작/진화가 공유하는 난수 인터페이스 */
export abstract class RandomSource {
  /** 0.0 ~ 1.0 실수 */
  abstract next(): number;

  /** min~max 정수 (inclusive) */
  range(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** min~max 실수 */
  uniform(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** 0~100 percent 미만이면 true */
  chance(percent: number): boolean {
    return this.next() * 100 < percent;
  }

  /** 0~1 확률 판정 */
  roll(probability: number): boolean {
    return this.next() < probability;
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.min(items.length - 1, Math.floor(this.next() * items.length))];
  }
}

export class Rng extends RandomSource {
  private state: bigint;
  private _cursor: number;
  private _consumed: number;

  constructor(
    public readonly seed: string,
    cursor: number = 0,
  ) {
    super();
    this.state = this.hashSeed(seed);
    this._cursor = cursor;
    this._consumed = 0;
    // 커서 위치까지 빠르게 진행 (상태만 진행, cursor/consumed 변경 없음)
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & 0xFFFFFFFFFFFFFFFFn;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + 0x9E3779B97F4A7C15n) & 0xFFFFFFFFFFFFFFFFn;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this._consumed++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & 0xFFFFFFFFFFFFFFFFn;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & 0xFFFFFFFFFFFFFFFFn;
    return (z ^ (z >> 31n)) & 0xFFFFFFFFFFFFFFFFn;
  }

  next(): number {
    // 상위 53비트만 사용: [0, 1)
    return Number(this.nextRaw() >> 11n) / 9007199254740992;
  }

  getState(): RngState {
    return { seed: this.seed, cursor: this._cursor };
  }

  get cursor(): number {
    return this._cursor;
  }

  get consumed(): number {
    return this._consumed;
  }
}

@Injectable()
export class RngService {
  /** seed + cursor 기반 결정적 RNG 인스턴스 생성 */
  create(seed: string, cursor: number = 0): Rng {
    return new Rng(seed, cursor);
  }

  restore(state: RngState): Rng {
    return new Rng(state.seed, state.cursor);
  }
}
