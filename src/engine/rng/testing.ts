import { RandomSource } from './rng.service.js';

/** 주어진 값을 순서대로 돌려준다. 다 쓰면 마지막 값을 반복 */
export class ScriptedRandom extends RandomSource {
  private index = 0;
  draws = 0;

  constructor(private readonly values: number[]) {
    super();
    if (values.length === 0) throw new Error('ScriptedRandom needs at least one value');
  }

  next(): number {
    this.draws++;
    const value = this.values[Math.min(this.index, this.values.length - 1)];
    this.index++;
    return value;
  }
}
