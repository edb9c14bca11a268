import { ProgressionService } from './progression.service.js';
import { ArsenalConfigService } from '../../config/arsenal-config.service.js';
import { ScriptedRandom } from '../rng/testing.js';
import {
  WeaponTemplateSchema,
  type WeaponInstance,
  type WeaponTemplateInput,
} from '../../types/index.js';

function makeInstance(overrides: Partial<WeaponTemplateInput> = {}): WeaponInstance {
  const template = WeaponTemplateSchema.parse({
    id: 'arc_rifle',
    name: 'Arc Rifle',
    description: 'test weapon',
    category: 'ENERGY',
    rarity: 'COMMON',
    stats: { baseDamage: 20, damageType: 'ENERGY', maxCharge: 100, chargeRate: 10, durability: 100 },
    effects: [
      {
        id: 'arc',
        name: 'Arc',
        category: 'DAMAGE',
        damage: 10,
        cooldown: 4,
        triggerConditions: { minCharge: 10, triggerChance: 0.2 },
      },
    ],
    evolutionPaths: [
      {
        id: 'overcharge',
        name: 'Overcharge',
        levelRequirement: 3,
        changes: {
          stats: { baseDamage: 30, maxCharge: 50 },
          effectChanges: { arc: { damage: 20, triggerConditions: { triggerChance: 0.5 } } },
        },
      },
      {
        id: 'storm_core',
        name: 'Storm Core',
        levelRequirement: 6,
        prerequisites: ['overcharge'],
        changes: {
          newEffect: { id: 'storm', name: 'Storm', category: 'DAMAGE', damage: 40, aoeRadius: 3 },
        },
      },
    ],
    ...overrides,
  });
  return {
    playerId: 'player_1',
    templateId: template.id,
    effective: template,
    currentCharge: 80,
    currentDurability: 100,
    cooldowns: {},
    kills: 0,
    damageDealt: 0,
    specialTriggers: 0,
  };
}

describe('ProgressionService', () => {
  let service: ProgressionService;
  let instance: WeaponInstance;

  beforeEach(() => {
    service = new ProgressionService(new ArsenalConfigService({ firstLevelExp: 1000 }));
    instance = makeInstance();
    service.createProgress(instance);
  });

  describe('grantExperience', () => {
    it('gain = floor(base * factor * dampening), 레벨업 시 임계값 x1.5', () => {
      const result = service.grantExperience(instance, 'KILL', 600);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      // 600 * 2.0 * 1.0 = 1200 → level 2, 남은 200, 다음 1500
      expect(result.value).toEqual({
        experienceGained: 1200,
        previousLevel: 1,
        level: 2,
        levelsGained: 1,
        experience: 200,
        nextLevelExp: 1500,
        evolutionsGained: 0,
        evolutionsAvailable: 0,
      });
    });

    it('3의 배수 레벨마다 진화 슬롯 +1', () => {
      service.grantExperience(instance, 'KILL', 500); // 1000 → level 2
      const result = service.grantExperience(instance, 'DAMAGE_DEALT', 15000); // 1500 → level 3
      expect(result.ok && result.value.level).toBe(3);
      expect(result.ok && result.value.evolutionsGained).toBe(1);
      expect(service.getProgress('player_1', 'arc_rifle')?.nextLevelExp).toBe(2250);
    });

    it('희귀도 감쇠', () => {
      const rare = makeInstance({ id: 'rare_rifle', rarity: 'RARE' });
      service.createProgress(rare);
      const result = service.grantExperience(rare, 'KILL', 100);
      // 100 * 2.0 * 0.8
      expect(result.ok && result.value.experienceGained).toBe(160);
    });

    it('레벨은 감소하지 않고 경험치는 항상 임계값 미만', () => {
      let lastLevel = 1;
      for (const base of [10, 900, 3000, 0, 45000, 1, 120000]) {
        const result = service.grantExperience(instance, 'EFFECT_TRIGGERED', base);
        if (!result.ok) throw result.error;
        expect(result.value.level).toBeGreaterThanOrEqual(lastLevel);
        expect(result.value.experience).toBeLessThan(result.value.nextLevelExp);
        lastLevel = result.value.level;
      }
    });

    it('진행도가 없으면 NotFoundError', () => {
      const orphan = makeInstance({ id: 'orphan' });
      const result = service.grantExperience(orphan, 'KILL', 100);
      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.code).toBe('NOT_FOUND');
    });
  });

  describe('recordCombatResult', () => {
    it('0.1·피해 + 100·킬 + 20·치명타 + 50·효과', () => {
      const result = service.recordCombatResult(instance, {
        damageDealt: 125,
        kills: 2,
        criticalHits: 1,
        effectsTriggered: 1,
      });
      // 12 + 200 + 20 + 50
      expect(result.ok && result.value.experienceGained).toBe(282);
    });
  });

  describe('applyEvolution', () => {
    function reachLevel3(): void {
      service.grantExperience(instance, 'KILL', 500);
      service.grantExperience(instance, 'KILL', 750);
    }

    it('슬롯이 없으면 거절', () => {
      const result = service.applyEvolution(instance, 'overcharge');
      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.message).toBe('No evolution slot available');
    });

    it('스탯 덮어쓰기, 효과 패치 병합, 충전량 재클램프', () => {
      reachLevel3();
      const result = service.applyEvolution(instance, 'overcharge');
      expect(result.ok).toBe(true);

      expect(instance.effective.stats.baseDamage).toBe(30);
      expect(instance.effective.stats.maxCharge).toBe(50);
      expect(instance.currentCharge).toBe(50);
      const arc = instance.effective.effects[0];
      expect(arc.category === 'DAMAGE' && arc.damage).toBe(20);
      expect(arc.triggerConditions).toEqual({ minCharge: 10, triggerChance: 0.5 });
      expect(arc.cooldown).toBe(4);

      const progress = service.getProgress('player_1', 'arc_rifle');
      expect(progress?.evolutionsAvailable).toBe(0);
      expect(progress?.appliedEvolutions).toEqual(['overcharge']);
    });

    it('같은 진화는 한 번만 적용', () => {
      reachLevel3();
      service.applyEvolution(instance, 'overcharge');
      const progress = service.getProgress('player_1', 'arc_rifle');
      if (!progress) throw new Error('progress missing');
      progress.evolutionsAvailable = 1;

      const second = service.applyEvolution(instance, 'overcharge');
      expect(second.ok).toBe(false);
      expect(!second.ok && second.error.code).toBe('NOT_ELIGIBLE');
      expect(instance.effective.stats.baseDamage).toBe(30);
      expect(progress.evolutionsAvailable).toBe(1);
    });

    it('레벨/선행 진화 미충족', () => {
      const progress = service.getProgress('player_1', 'arc_rifle');
      if (!progress) throw new Error('progress missing');
      progress.evolutionsAvailable = 1;
      progress.level = 6;

      const result = service.applyEvolution(instance, 'storm_core');
      expect(!result.ok && result.error.message).toBe('Evolution requirements not met: storm_core');
    });

    it('알 수 없는 진화 id', () => {
      const result = service.applyEvolution(instance, 'nope');
      expect(!result.ok && result.error.code).toBe('NOT_FOUND');
    });

    it('newEffect 추가', () => {
      const progress = service.getProgress('player_1', 'arc_rifle');
      if (!progress) throw new Error('progress missing');
      progress.level = 6;
      progress.evolutionsAvailable = 2;

      service.applyEvolution(instance, 'overcharge');
      const result = service.applyEvolution(instance, 'storm_core');
      expect(result.ok).toBe(true);
      expect(instance.effective.effects.map((e) => e.id)).toEqual(['arc', 'storm']);
    });

    it('검증 실패 시 인스턴스와 슬롯은 그대로', () => {
      const broken = makeInstance({
        id: 'broken_rifle',
        evolutionPaths: [
          {
            id: 'negative',
            name: 'Negative',
            levelRequirement: 1,
            changes: { effectChanges: { arc: { damage: -5 } } },
          },
        ],
      });
      service.createProgress(broken);
      const progress = service.getProgress('player_1', 'broken_rifle');
      if (!progress) throw new Error('progress missing');
      progress.evolutionsAvailable = 1;

      const result = service.applyEvolution(broken, 'negative');
      expect(!result.ok && result.error.code).toBe('INVALID_INPUT');
      const arc = broken.effective.effects[0];
      expect(arc.category === 'DAMAGE' && arc.damage).toBe(10);
      expect(progress.evolutionsAvailable).toBe(1);
      expect(progress.appliedEvolutions).toEqual([]);
    });

    it('효과 id 변경 패치는 거절', () => {
      const renamed = makeInstance({
        id: 'renamed_rifle',
        evolutionPaths: [
          { id: 'rename', name: 'Rename', levelRequirement: 1, changes: { effectChanges: { arc: { id: 'bolt' } } } },
        ],
      });
      service.createProgress(renamed);
      const progress = service.getProgress('player_1', 'renamed_rifle');
      if (!progress) throw new Error('progress missing');
      progress.evolutionsAvailable = 1;

      const result = service.applyEvolution(renamed, 'rename');
      expect(!result.ok && result.error.message).toBe('Evolution cannot rename effect arc');
    });
  });

  describe('evolutionStatus', () => {
    it('다음 진화까지 남은 레벨', () => {
      service.grantExperience(instance, 'KILL', 250); // 500
      const result = service.evolutionStatus(instance);
      if (!result.ok) throw result.error;
      expect(result.value.progressPercent).toBe(50);
      expect(result.value.nextEvolution).toEqual({
        id: 'overcharge',
        name: 'Overcharge',
        levelRequirement: 3,
        levelsNeeded: 2,
      });
      expect(result.value.available).toEqual([]);
    });
  });

  describe('generateRandomEvolution', () => {
    it('DAMAGE_BOOST: 현재 기본 피해 + 5~15', () => {
      // suffix 1000, kind index 0, increment floor(0.5 * 11) + 5 = 10
      const path = service.generateRandomEvolution(instance, new ScriptedRandom([0, 0, 0.5]));
      expect(path.id).toBe('random_evolution_1000');
      expect(path.levelRequirement).toBe(3);
      expect(path.changes.stats).toEqual({ baseDamage: 30 });
    });

    it('NEW_MINOR_EFFECT: 카테고리별 효과에 접미사', () => {
      const path = service.generateRandomEvolution(instance, new ScriptedRandom([0.5, 0.9]));
      expect(path.id).toBe('random_evolution_5500');
      expect(path.changes.newEffect?.id).toBe('energy_spark_5500');
    });

    it('COOLDOWN_REDUCTION: 최소 1 감소, 결과는 1 이상', () => {
      // kind index floor(0.8 * 7) = 5
      const path = service.generateRandomEvolution(instance, new ScriptedRandom([0, 0.8, 0]));
      expect(path.changes.effectChanges).toEqual({ arc: { cooldown: 3 } });
    });

    it('생성된 경로를 붙이고 적용', () => {
      const path = service.generateRandomEvolution(instance, new ScriptedRandom([0, 0, 0.5]));
      expect(service.addEvolutionPath(instance, path).ok).toBe(true);
      expect(service.addEvolutionPath(instance, path).ok).toBe(false);

      service.grantExperience(instance, 'KILL', 500);
      service.grantExperience(instance, 'KILL', 750);
      const applied = service.applyEvolution(instance, path.id);
      expect(applied.ok).toBe(true);
      expect(instance.effective.stats.baseDamage).toBe(30);
    });
  });
});
