import { CraftingService } from './crafting.service.js';
import { ComponentCatalogService } from './component-catalog.service.js';
import { WeaponCatalogService } from '../arsenal/weapon-catalog.service.js';
import { WeaponRegistryService } from '../arsenal/weapon-registry.service.js';
import { ProgressionService } from '../progression/progression.service.js';
import { ArsenalConfigService } from '../../config/arsenal-config.service.js';
import { Rng } from '../rng/rng.service.js';
import { ScriptedRandom } from '../rng/testing.js';
import type { ComponentInput } from '../../types/index.js';

const COMPONENTS: ComponentInput[] = [
  {
    id: 'reinforced_frame',
    name: 'Reinforced Frame',
    category: 'FRAME',
    rarity: 'COMMON',
    compatibility: ['MELEE', 'PROJECTILE'],
    modifiers: { stats: { weight: 2, durability: 30 } },
    craftingDifficulty: 3,
  },
  {
    id: 'arc_frame',
    name: 'Arc Frame',
    category: 'FRAME',
    rarity: 'COMMON',
    compatibility: ['ENERGY'],
    craftingDifficulty: 2,
  },
  {
    id: 'adaptive_frame',
    name: 'Adaptive Frame',
    category: 'FRAME',
    rarity: 'EPIC',
    compatibility: ['ENERGY', 'TECH', 'PROJECTILE'],
    craftingDifficulty: 5,
  },
  {
    id: 'heavy_barrel',
    name: 'Heavy Barrel',
    category: 'BARREL',
    rarity: 'COMMON',
    compatibility: ['MELEE'],
    modifiers: { stats: { baseDamage: 5, accuracy: -0.05 } },
    craftingDifficulty: 3,
  },
  {
    id: 'focus_lens',
    name: 'Focus Lens',
    category: 'BARREL',
    rarity: 'COMMON',
    compatibility: ['ENERGY', 'TECH'],
    modifiers: { stats: { baseDamage: -30 } },
    craftingDifficulty: 2,
  },
  {
    id: 'universal_grip',
    name: 'Universal Grip',
    category: 'HANDLE',
    rarity: 'COMMON',
    modifiers: { stats: { accuracy: 0.5 } },
    craftingDifficulty: 1,
  },
  {
    id: 'elemental_converter',
    name: 'Elemental Converter',
    category: 'MODIFIER',
    rarity: 'RARE',
    compatibility: ['ENERGY', 'TECH'],
    modifiers: {
      damageType: 'ELEMENTAL',
      newEffect: {
        id: 'elemental_damage',
        name: 'Elemental Damage',
        category: 'STATUS',
        statusType: 'ELEMENTAL_BURN',
        statusStrength: 2,
        applicationChance: 0.4,
      },
    },
    craftingDifficulty: 5,
  },
];

describe('CraftingService', () => {
  let components: ComponentCatalogService;
  let catalog: WeaponCatalogService;
  let registry: WeaponRegistryService;
  let crafting: CraftingService;

  function build(): void {
    components = new ComponentCatalogService();
    catalog = new WeaponCatalogService();
    const progression = new ProgressionService(new ArsenalConfigService({ firstLevelExp: 1000 }));
    registry = new WeaponRegistryService(catalog, progression);
    crafting = new CraftingService(components, catalog, registry);
    for (const c of COMPONENTS) components.registerComponent(c);
  }

  beforeEach(build);

  describe('previewCraft', () => {
    it('교집합이 {MELEE} 이면 MELEE', () => {
      const result = crafting.previewCraft({ FRAME: 'reinforced_frame', BARREL: 'heavy_barrel' });
      if (!result.ok) throw result.error;
      expect(result.value.category).toBe('MELEE');
      expect(result.value.rarity).toBe('COMMON');
      expect(result.value.craftingDifficulty).toBe(3);
      expect(result.value.stats).toMatchObject({
        baseDamage: 40,
        durability: 150,
        weight: 6,
        damageType: 'PHYSICAL',
      });
      expect(result.value.stats.accuracy).toBeCloseTo(0.85);
      expect(result.value.effects.map((e) => e.id)).toEqual(['power_strike']);
    });

    it('교집합이 비면 NO_COMPATIBLE_CATEGORY', () => {
      const result = crafting.previewCraft({ FRAME: 'arc_frame', BARREL: 'heavy_barrel' });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.reason).toBe('NO_COMPATIBLE_CATEGORY');
    });

    it('FRAME / BARREL 필수', () => {
      const result = crafting.previewCraft({ FRAME: 'reinforced_frame' });
      expect(!result.ok && result.error.reason).toBe('MISSING_REQUIRED_COMPONENT');
      expect(!result.ok && result.error.message).toBe('Missing required component: BARREL');
    });

    it('없는 부품 / 슬롯이 맞지 않는 부품', () => {
      const unknown = crafting.previewCraft({ FRAME: 'reinforced_frame', BARREL: 'ghost_barrel' });
      expect(!unknown.ok && unknown.error.reason).toBe('UNKNOWN_COMPONENT');

      const wrongSlot = crafting.previewCraft({ FRAME: 'heavy_barrel', BARREL: 'heavy_barrel' });
      expect(!wrongSlot.ok && wrongSlot.error.message).toBe('heavy_barrel is not a FRAME component');
    });

    it('여러 카테고리가 남으면 우선순위 (TECH > ENERGY)', () => {
      const result = crafting.previewCraft({ FRAME: 'adaptive_frame', BARREL: 'focus_lens' });
      expect(result.ok && result.value.category).toBe('TECH');
    });

    it('호환 목록이 빈 부품은 어디에나 맞고, 클램프 적용', () => {
      const result = crafting.previewCraft({
        FRAME: 'arc_frame',
        BARREL: 'focus_lens',
        HANDLE: 'universal_grip',
      });
      if (!result.ok) throw result.error;
      expect(result.value.category).toBe('ENERGY');
      // 20 - 30 → 최소 5, 0.8 + 0.5 → 최대 0.98
      expect(result.value.stats.baseDamage).toBe(5);
      expect(result.value.stats.accuracy).toBe(0.98);
      // mean(2, 2, 1) + 1 = 2.67
      expect(result.value.craftingDifficulty).toBe(3);
    });
  });

  describe('craft', () => {
    it('등록 + 지급 + 제작 기록', () => {
      const result = crafting.craft(
        {
          playerId: 'player_1',
          slots: { BARREL: 'heavy_barrel', FRAME: 'reinforced_frame' },
          name: 'Breaker',
          description: 'Crafted test blade',
        },
        new ScriptedRandom([0.5]),
      );
      if (!result.ok) throw result.error;

      expect(result.value.template.id).toBe('crafted_melee_5500');
      expect(result.value.template.crafted).toBe(true);
      expect(catalog.hasTemplate('crafted_melee_5500')).toBe(true);
      expect(registry.getInstance('player_1', 'crafted_melee_5500')?.currentDurability).toBe(150);
      expect(crafting.getCraftedRecord('player_1', 'crafted_melee_5500')).toMatchObject({
        components: { FRAME: 'reinforced_frame', BARREL: 'heavy_barrel' },
        craftingDifficulty: 3,
      });
    });

    it('부품 효과 + 희귀도 보너스 (RARE 50%)', () => {
      const slots = { FRAME: 'adaptive_frame', BARREL: 'focus_lens', MODIFIER: 'elemental_converter' };
      const request = { playerId: 'player_1', slots, name: 'Converter', description: 'x' };

      // 판정 0.2 < 0.5 → 보너스, 접미사 5500, 무기 id 5500
      const lucky = crafting.craft(request, new ScriptedRandom([0.2, 0, 0.5]));
      if (!lucky.ok) throw lucky.error;
      expect(lucky.value.template.rarity).toBe('RARE');
      expect(lucky.value.template.stats.damageType).toBe('ELEMENTAL');
      expect(lucky.value.template.effects.map((e) => e.id)).toEqual(['elemental_damage', 'targeting_assist_5500']);

      build();
      const unlucky = crafting.craft(request, new ScriptedRandom([0.9]));
      if (!unlucky.ok) throw unlucky.error;
      expect(unlucky.value.template.id).toBe('crafted_tech_9100');
      expect(unlucky.value.template.effects.map((e) => e.id)).toEqual(['elemental_damage']);
    });

    it('같은 시드면 같은 결과', () => {
      const slots = { FRAME: 'adaptive_frame', BARREL: 'focus_lens', MODIFIER: 'elemental_converter' };
      const request = { playerId: 'player_1', slots, name: 'Seeded', description: 'x' };

      const first = crafting.craft(request, new Rng('craft-seed'));
      build();
      const second = crafting.craft(request, new Rng('craft-seed'));
      if (!first.ok || !second.ok) throw new Error('craft failed');
      expect(second.value.template).toEqual(first.value.template);
    });

    it('id 충돌 시 다시 뽑는다', () => {
      catalog.registerTemplate({
        id: 'crafted_melee_5500',
        name: 'Taken',
        description: 'x',
        category: 'MELEE',
        rarity: 'COMMON',
        stats: { baseDamage: 10 },
        effects: [],
      });
      const result = crafting.craft(
        { playerId: 'player_1', slots: { FRAME: 'reinforced_frame', BARREL: 'heavy_barrel' }, name: 'B', description: 'x' },
        new ScriptedRandom([0.5, 0.5, 0.1]),
      );
      expect(result.ok && result.value.template.id).toBe('crafted_melee_1900');
    });

    it('호환 실패 시 아무것도 등록되지 않는다', () => {
      const result = crafting.craft(
        { playerId: 'player_1', slots: { FRAME: 'arc_frame', BARREL: 'heavy_barrel' }, name: 'B', description: 'x' },
        new ScriptedRandom([0.5]),
      );
      expect(result.ok).toBe(false);
      expect(catalog.listTemplates()).toEqual([]);
      expect(registry.listInstances('player_1')).toEqual([]);
    });
  });

  describe('disassemble', () => {
    function craftBlade(): string {
      const result = crafting.craft(
        { playerId: 'player_1', slots: { FRAME: 'reinforced_frame', BARREL: 'heavy_barrel' }, name: 'B', description: 'x' },
        new ScriptedRandom([0.5]),
      );
      if (!result.ok) throw result.error;
      return result.value.template.id;
    }

    it('회수 확률 = 0.3 + 내구도비율 * 0.5, 무기와 기록은 삭제', () => {
      const weaponId = craftBlade();
      const result = crafting.disassemble('player_1', weaponId, new ScriptedRandom([0.79, 0.8]));
      if (!result.ok) throw result.error;

      expect(result.value.recoveryChance).toBeCloseTo(0.8);
      expect(result.value.recovered).toEqual([
        { slot: 'FRAME', componentId: 'reinforced_frame', name: 'Reinforced Frame' },
      ]);
      expect(registry.getInstance('player_1', weaponId)).toBeUndefined();
      expect(crafting.getCraftedRecord('player_1', weaponId)).toBeUndefined();
    });

    it('내구도 0 이면 30%', () => {
      const weaponId = craftBlade();
      const instance = registry.getInstance('player_1', weaponId);
      if (!instance) throw new Error('instance missing');
      instance.currentDurability = 0;

      const result = crafting.disassemble('player_1', weaponId, new ScriptedRandom([0.9]));
      expect(result.ok && result.value.recoveryChance).toBeCloseTo(0.3);
      expect(result.ok && result.value.recovered).toEqual([]);
    });

    it('제작 무기가 아니면 거절', () => {
      catalog.registerTemplate({
        id: 'stock_blade',
        name: 'Stock Blade',
        description: 'x',
        category: 'MELEE',
        rarity: 'COMMON',
        stats: { baseDamage: 10 },
        effects: [],
      });
      registry.assign('player_1', 'stock_blade');
      const result = crafting.disassemble('player_1', 'stock_blade', new ScriptedRandom([0]));
      expect(!result.ok && result.error.details).toMatchObject({ reason: 'NOT_CRAFTED' });
      expect(registry.getInstance('player_1', 'stock_blade')).toBeDefined();
    });

    it('registry.remove 로 지워도 제작 기록이 사라진다', () => {
      const weaponId = craftBlade();
      registry.remove('player_1', weaponId);
      expect(crafting.getCraftedRecord('player_1', weaponId)).toBeUndefined();
    });
  });
});
