import { Rng, RngService } from './rng.service.js';
import { ScriptedRandom } from './testing.js';

describe('RngService', () => {
  let service: RngService;

  beforeEach(() => {
    service = new RngService();
  });

  it('should create an Rng instance', () => {
    const rng = service.create('test-seed', 0);
    expect(rng).toBeInstanceOf(Rng);
  });

  it('restore: 저장한 상태에서 이어서 동일 결과', () => {
    const rng = service.create('save-me');
    rng.next();
    rng.next();
    const state = rng.getState();
    const expected = rng.next();

    expect(state).toEqual({ seed: 'save-me', cursor: 2 });
    expect(service.restore(state).next()).toBe(expected);
  });
});

describe('Rng: 결정성', () => {
  it('동일 seed + cursor → 동일 시퀀스', () => {
    const a = new Rng('seed-abc', 0);
    const b = new Rng('seed-abc', 0);

    for (let i = 0; i < 100; i++) {
      expect(a.next()).toBe(b.next());
    }
  });

  it('다른 seed → 다른 시퀀스', () => {
    const a = new Rng('seed-1', 0);
    const b = new Rng('seed-2', 0);

    const results = Array.from({ length: 10 }, () => a.next() === b.next());
    expect(results.some((same) => !same)).toBe(true);
  });

  it('cursor 복원: 중간부터 시작해도 동일 결과', () => {
    const full = new Rng('seed-xyz', 0);
    for (let i = 0; i < 50; i++) full.next();
    const afterFifty = full.next();

    const resumed = new Rng('seed-xyz', 50);
    expect(resumed.next()).toBe(afterFifty);
  });

  it('cursor / consumed 추적', () => {
    const rng = new Rng('track', 10);
    expect(rng.cursor).toBe(10);
    expect(rng.consumed).toBe(0);
    rng.next();
    rng.range(1, 100);
    rng.roll(0.5);
    expect(rng.cursor).toBe(13);
    expect(rng.consumed).toBe(3);
  });

  it('next() 는 [0, 1) 범위', () => {
    const rng = new Rng('unit-interval');
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe('Rng: range', () => {
  it('min~max 범위 안에 있다', () => {
    const rng = new Rng('range-test', 0);
    for (let i = 0; i < 500; i++) {
      const val = rng.range(5, 15);
      expect(val).toBeGreaterThanOrEqual(5);
      expect(val).toBeLessThanOrEqual(15);
    }
  });

  it('1~10 의 모든 값이 나온다', () => {
    const rng = new Rng('range-cover', 0);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) seen.add(rng.range(1, 10));
    expect(seen.size).toBe(10);
  });
});

describe('Rng: chance / roll', () => {
  it('0 → 항상 false, 최대 → 항상 true', () => {
    const rng = new Rng('chance', 0);
    for (let i = 0; i < 100; i++) {
      expect(rng.chance(0)).toBe(false);
      expect(rng.chance(100)).toBe(true);
      expect(rng.roll(0)).toBe(false);
      expect(rng.roll(1)).toBe(true);
    }
  });
});

describe('ScriptedRandom', () => {
  it('주어진 값을 순서대로, 이후 마지막 값을 반복', () => {
    const rng = new ScriptedRandom([0.1, 0.9]);
    expect(rng.next()).toBe(0.1);
    expect(rng.next()).toBe(0.9);
    expect(rng.next()).toBe(0.9);
    expect(rng.draws).toBe(3);
  });

  it('공통 헬퍼가 스크립트 값을 사용한다', () => {
    const rng = new ScriptedRandom([0.25, 0.25, 0.99, 0.5]);
    expect(rng.roll(0.3)).toBe(true);
    expect(rng.range(1, 4)).toBe(2);
    expect(rng.range(1, 10)).toBe(10);
    expect(rng.pick(['a', 'b', 'c', 'd'])).toBe('c');
  });
});
