import { DamageService } from './damage.service.js';
import { CombatantSchema, type Combatant, type CombatantInput } from '../../types/index.js';

function makeTarget(overrides: Partial<CombatantInput> = {}): Combatant {
  return CombatantSchema.parse({
    id: 'enemy_01',
    name: 'Drone',
    side: 'ENEMY',
    health: 50,
    maxHealth: 50,
    ...overrides,
  });
}

describe('DamageService', () => {
  let service: DamageService;

  beforeEach(() => {
    service = new DamageService();
  });

  describe('computeDamage', () => {
    it('total = damage + floor(base * multiplier), 저항 0', () => {
      const r = service.computeDamage(
        { damage: 10, damageMultiplier: 1.0, armorPenetration: 0, damageType: 'PHYSICAL' },
        20,
        makeTarget(),
      );
      expect(r).toEqual({ total: 30, resistance: 0, final: 30 });
    });

    it('저항 적용 후 내림', () => {
      const r = service.computeDamage(
        { damage: 5, damageMultiplier: 1.5, armorPenetration: 0, damageType: 'ENERGY' },
        15,
        makeTarget({ resistances: { ENERGY: 0.25 } }),
      );
      // 5 + floor(22.5) = 27, 27 * 0.75 = 20.25
      expect(r.total).toBe(27);
      expect(r.final).toBe(20);
    });

    it('관통이 저항을 깎고 0 아래로는 내려가지 않는다', () => {
      const target = makeTarget({ resistances: { THERMAL: 0.3 } });
      expect(service.resistanceFor(target, 'THERMAL', 0.1)).toBeCloseTo(0.2);
      expect(service.resistanceFor(target, 'THERMAL', 0.5)).toBe(0);
    });

    it('저항 100% 이상이어도 최소 1', () => {
      for (const res of [1, 1.5, 3]) {
        const r = service.computeDamage(
          { damage: 40, damageMultiplier: 2, armorPenetration: 0, damageType: 'VOID' },
          50,
          makeTarget({ resistances: { VOID: res } }),
        );
        expect(r.final).toBe(1);
      }
    });

    it('피해 0 입력도 최소 1', () => {
      const r = service.computeDamage(
        { damage: 0, damageMultiplier: 0, armorPenetration: 0, damageType: 'PHYSICAL' },
        0,
        makeTarget(),
      );
      expect(r.final).toBe(1);
    });
  });

  describe('selectTargets', () => {
    const primary = makeTarget({ id: 'p' });
    const a = makeTarget({ id: 'a' });
    const b = makeTarget({ id: 'b' });
    const c = makeTarget({ id: 'c' });

    it('aoeRadius 0 → 주 대상만', () => {
      expect(service.selectTargets(primary, [a, b], { a: 0, b: 0 }, 0, 5).map((t) => t.id)).toEqual(['p']);
    });

    it('반경 안 후보를 입력 순서로 채우고 maxTargets 로 자른다', () => {
      const ids = service
        .selectTargets(primary, [a, b, c], { a: 2, b: 9, c: 4 }, 5, 3)
        .map((t) => t.id);
      expect(ids).toEqual(['p', 'a', 'c']);
    });

    it('거리 맵에 없는 후보는 제외', () => {
      const ids = service.selectTargets(primary, [a, b], { b: 1 }, 5, 5).map((t) => t.id);
      expect(ids).toEqual(['p', 'b']);
    });

    it('maxTargets 1 이면 광역이어도 주 대상만', () => {
      const ids = service.selectTargets(primary, [a], { a: 1 }, 5, 1).map((t) => t.id);
      expect(ids).toEqual(['p']);
    });
  });

  describe('applyDamage', () => {
    it('HP 감소, 0 에서 멈추고 킬 표시', () => {
      const t = makeTarget({ health: 20 });
      const r = service.applyDamage(t, 30);
      expect(t.health).toBe(0);
      expect(r).toMatchObject({ dealt: 20, healthBefore: 20, healthAfter: 0, killed: true });
    });

    it('이미 쓰러진 대상은 킬로 세지 않는다', () => {
      const t = makeTarget({ health: 0 });
      expect(service.applyDamage(t, 10).killed).toBe(false);
    });

    it('방어 중이면 절반', () => {
      const t = makeTarget({
        modifiers: [{ kind: 'DEFEND', value: 0, startTime: 0, endTime: 2 }],
      });
      service.applyDamage(t, 15);
      expect(t.health).toBe(43);
    });

    it('방어 중이어도 1 피해는 1 로 남는다', () => {
      const t = makeTarget({
        modifiers: [{ kind: 'DEFEND', value: 0, startTime: 0, endTime: 2 }],
      });
      expect(service.applyDamage(t, 1).dealt).toBe(1);
      expect(t.health).toBe(49);
    });

    it('보호막이 먼저 흡수하고 소진되면 제거된다', () => {
      const t = makeTarget({
        modifiers: [{ kind: 'SHIELD', value: 12, startTime: 0, endTime: 3 }],
      });
      const first = service.applyDamage(t, 10);
      expect(first).toMatchObject({ dealt: 0, absorbed: 10 });
      expect(t.modifiers[0].value).toBe(2);

      const second = service.applyDamage(t, 10);
      expect(second).toMatchObject({ dealt: 8, absorbed: 2 });
      expect(t.modifiers).toHaveLength(0);
      expect(t.health).toBe(42);
    });
  });
});
