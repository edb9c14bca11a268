// 부품 조합 → 무기 템플릿 합성 / 분해

import { Injectable, Logger } from '@nestjs/common';
import {
  CraftError,
  NotFoundError,
  type AlreadyAssignedError,
  type DuplicateIdError,
  type InvalidInputError,
  type MissingFieldError,
} from '../../common/errors/game-errors.js';
import type { RandomSource } from '../rng/rng.service.js';
import { WeaponCatalogService } from '../arsenal/weapon-catalog.service.js';
import { WeaponRegistryService } from '../arsenal/weapon-registry.service.js';
import { ComponentCatalogService } from './component-catalog.service.js';
import {
  ACCURACY_RANGE,
  BASE_STATS,
  BONUS_EFFECTS,
  CATEGORY_PRIORITY,
  DEFAULT_EFFECTS,
  MIN_BASE_DAMAGE,
  MIN_DURABILITY,
  RARITY_BONUS_RULES,
  RECOVERY_BASE,
  RECOVERY_DURABILITY_WEIGHT,
  REQUIRED_SLOTS,
  complexityBonus,
} from './crafting-tables.js';
import {
  COMPONENT_CATEGORY,
  EffectDescriptorSchema,
  NUMERIC_STAT_KEYS,
  RARITY,
  RARITY_VALUE,
  WEAPON_CATEGORY,
  err,
  instanceKey,
  ok,
  type Component,
  type ComponentCategory,
  type CraftedWeaponRecord,
  type EffectDescriptor,
  type Rarity,
  type Result,
  type SlotAssignment,
  type WeaponCategory,
  type WeaponInstance,
  type WeaponStats,
  type WeaponTemplate,
} from '../../types/index.js';

export interface SlottedComponent {
  slot: ComponentCategory;
  component: Component;
}

export interface CraftPreview {
  category: WeaponCategory;
  rarity: Rarity;
  craftingDifficulty: number;
  stats: WeaponStats;
  /** 부품 효과 또는 카테고리 기본 효과 (희귀도 보너스 제외) */
  effects: EffectDescriptor[];
  components: SlottedComponent[];
}

export interface CraftRequest {
  playerId: string;
  slots: SlotAssignment;
  name: string;
  description: string;
}

export interface CraftOutcome {
  template: WeaponTemplate;
  instance: WeaponInstance;
  record: CraftedWeaponRecord;
}

export interface RecoveredComponent {
  slot: ComponentCategory;
  componentId: string;
  name: string;
}

export interface DisassembleOutcome {
  weaponId: string;
  recoveryChance: number;
  recovered: RecoveredComponent[];
}

export type CraftFailure =
  | CraftError
  | MissingFieldError
  | InvalidInputError
  | DuplicateIdError
  | NotFoundError
  | AlreadyAssignedError;

@Injectable()
export class CraftingService {
  private readonly logger = new Logger(CraftingService.name);
  private readonly records = new Map<string, CraftedWeaponRecord>();

  constructor(
    private readonly components: ComponentCatalogService,
    private readonly catalog: WeaponCatalogService,
    private readonly registry: WeaponRegistryService,
  ) {
    // 인스턴스가 어떤 경로로 지워지든 제작 기록도 함께 삭제
    this.registry.onRemove((playerId, weaponId) => {
      this.records.delete(instanceKey(playerId, weaponId));
    });
  }

  // --- 1~7단계: 난수 없이 결정 ---

  previewCraft(slots: SlotAssignment): Result<CraftPreview, CraftError> {
    const resolved = this.resolveComponents(slots);
    if (!resolved.ok) return resolved;
    const list = resolved.value;

    const category = this.resolveCategory(list);
    if (!category.ok) return category;

    for (const { component } of list) {
      if (component.compatibility.length > 0 && !component.compatibility.includes(category.value)) {
        return err(
          new CraftError(
            'INCOMPATIBLE_COMPONENT',
            `${component.name} is not compatible with ${category.value}`,
            { componentId: component.id, category: category.value },
          ),
        );
      }
    }

    return ok({
      category: category.value,
      rarity: this.resolveRarity(list),
      craftingDifficulty: this.resolveDifficulty(list),
      stats: this.aggregateStats(category.value, list),
      effects: this.baseEffects(category.value, list),
      components: list,
    });
  }

  private resolveComponents(slots: SlotAssignment): Result<SlottedComponent[], CraftError> {
    for (const slot of REQUIRED_SLOTS) {
      if (!slots[slot]) {
        return err(new CraftError('MISSING_REQUIRED_COMPONENT', `Missing required component: ${slot}`, { slot }));
      }
    }

    // 슬롯 순서는 입력과 무관하게 고정 (마지막 기록 우선 규칙의 기준)
    const list: SlottedComponent[] = [];
    for (const slot of COMPONENT_CATEGORY) {
      const id = slots[slot];
      if (!id) continue;
      const component = this.components.getComponent(id);
      if (!component) {
        return err(new CraftError('UNKNOWN_COMPONENT', `Component not found: ${id}`, { slot, componentId: id }));
      }
      if (component.category !== slot) {
        return err(
          new CraftError('UNKNOWN_COMPONENT', `${id} is not a ${slot} component`, {
            slot,
            componentId: id,
            actual: component.category,
          }),
        );
      }
      list.push({ slot, component });
    }
    return ok(list);
  }

  /** 호환 집합 교집합 (빈 집합 = 전부 호환), 우선순위로 하나 선택 */
  private resolveCategory(list: SlottedComponent[]): Result<WeaponCategory, CraftError> {
    let common = new Set<WeaponCategory>(WEAPON_CATEGORY);
    for (const { component } of list) {
      if (component.compatibility.length === 0) continue;
      common = new Set(component.compatibility.filter((c) => common.has(c)));
    }
    const category = CATEGORY_PRIORITY.find((c) => common.has(c));
    if (!category) {
      return err(
        new CraftError('NO_COMPATIBLE_CATEGORY', 'No weapon category is compatible with every component', {
          components: list.map((s) => s.component.id),
        }),
      );
    }
    return ok(category);
  }

  private resolveDifficulty(list: SlottedComponent[]): number {
    const mean = list.reduce((sum, s) => sum + s.component.craftingDifficulty, 0) / list.length;
    return Math.min(10, Math.max(1, Math.round(mean + complexityBonus(list.length))));
  }

  /** round(mean * 0.7 + max * 0.3) → 그 값 이상인 첫 등급 */
  private resolveRarity(list: SlottedComponent[]): Rarity {
    const values = list.map((s) => RARITY_VALUE[s.component.rarity]);
    const mean = values.reduce((a, b) => a + b, 0) / values.length;
    const blended = Math.round(mean * 0.7 + Math.max(...values) * 0.3);
    return RARITY.find((r) => RARITY_VALUE[r] >= blended) ?? 'ARTIFACT';
  }

  private aggregateStats(category: WeaponCategory, list: SlottedComponent[]): WeaponStats {
    const stats: WeaponStats = { ...BASE_STATS[category] };
    for (const { component } of list) {
      for (const key of NUMERIC_STAT_KEYS) {
        const delta = component.modifiers.stats[key];
        if (delta !== undefined) stats[key] += delta;
      }
      if (component.modifiers.damageType) stats.damageType = component.modifiers.damageType;
    }

    stats.accuracy = Math.min(ACCURACY_RANGE.max, Math.max(ACCURACY_RANGE.min, stats.accuracy));
    stats.durability = Math.max(MIN_DURABILITY, stats.durability);
    stats.baseDamage = Math.max(MIN_BASE_DAMAGE, stats.baseDamage);
    // 스키마 범위 밖으로 나가지 않게
    stats.armorPenetration = Math.min(1, Math.max(0, stats.armorPenetration));
    stats.criticalChance = Math.min(1, Math.max(0, stats.criticalChance));
    stats.criticalDamage = Math.max(0, stats.criticalDamage);
    stats.range = Math.max(0, stats.range);
    stats.maxCharge = Math.max(0, stats.maxCharge);
    stats.chargeRate = Math.max(0, stats.chargeRate);
    return stats;
  }

  private baseEffects(category: WeaponCategory, list: SlottedComponent[]): EffectDescriptor[] {
    const effects: EffectDescriptor[] = [];
    for (const { component } of list) {
      const effect = component.modifiers.newEffect;
      if (effect && !effects.some((e) => e.id === effect.id)) effects.push(effect);
    }
    if (effects.length === 0) effects.push(EffectDescriptorSchema.parse(DEFAULT_EFFECTS[category]));
    return effects;
  }

  // --- 8~9단계 ---

  craft(request: CraftRequest, rng: RandomSource): Result<CraftOutcome, CraftFailure> {
    const preview = this.previewCraft(request.slots);
    if (!preview.ok) return preview;
    const { category, rarity, craftingDifficulty, stats, components } = preview.value;

    const effects = [...preview.value.effects];
    for (const rule of RARITY_BONUS_RULES[rarity]) {
      if (rule.chance < 1 && !rng.roll(rule.chance)) continue;
      const option = rng.pick(BONUS_EFFECTS[category][rule.tier]);
      if (!option) continue;
      effects.push(EffectDescriptorSchema.parse({ ...option, id: `${option.id}_${rng.range(1000, 9999)}` }));
    }

    let weaponId = `crafted_${category.toLowerCase()}_${rng.range(1000, 9999)}`;
    while (this.catalog.hasTemplate(weaponId)) {
      weaponId = `crafted_${category.toLowerCase()}_${rng.range(1000, 9999)}`;
    }

    const registered = this.catalog.registerTemplate({
      id: weaponId,
      name: request.name,
      description: request.description,
      category,
      rarity,
      stats,
      effects,
      evolutionPaths: [],
      crafted: true,
    });
    if (!registered.ok) return registered;

    const assigned = this.registry.assign(request.playerId, weaponId);
    if (!assigned.ok) return assigned;

    const usedSlots: SlotAssignment = {};
    for (const { slot, component } of components) usedSlots[slot] = component.id;
    const record: CraftedWeaponRecord = {
      playerId: request.playerId,
      weaponId,
      components: usedSlots,
      craftingDifficulty,
      craftedAt: new Date().toISOString(),
    };
    this.records.set(instanceKey(request.playerId, weaponId), record);

    this.logger.log(
      `Weapon crafted: ${weaponId} (${category}/${rarity}, difficulty ${craftingDifficulty}) for ${request.playerId}`,
    );
    return ok({ template: registered.value, instance: assigned.value, record });
  }

  /** 부품마다 0.3 + 내구도비율 * 0.5 확률로 회수, 무기는 회수 여부와 무관하게 삭제 */
  disassemble(
    playerId: string,
    weaponId: string,
    rng: RandomSource,
  ): Result<DisassembleOutcome, NotFoundError | CraftError> {
    const instance = this.registry.getInstance(playerId, weaponId);
    if (!instance) {
      return err(new NotFoundError(`Weapon not found: ${weaponId}`, { playerId, weaponId }));
    }
    const record = this.records.get(instanceKey(playerId, weaponId));
    if (!instance.effective.crafted || !record) {
      return err(new CraftError('NOT_CRAFTED', `Only crafted weapons can be disassembled: ${weaponId}`, { weaponId }));
    }

    const maxDurability = instance.effective.stats.durability;
    const ratio = maxDurability > 0 ? instance.currentDurability / maxDurability : 0;
    const recoveryChance = RECOVERY_BASE + ratio * RECOVERY_DURABILITY_WEIGHT;

    const recovered: RecoveredComponent[] = [];
    for (const slot of COMPONENT_CATEGORY) {
      const componentId = record.components[slot];
      if (!componentId) continue;
      if (!rng.roll(recoveryChance)) continue;
      recovered.push({
        slot,
        componentId,
        name: this.components.getComponent(componentId)?.name ?? componentId,
      });
    }

    const removed = this.registry.remove(playerId, weaponId);
    if (!removed.ok) return removed;

    this.logger.log(`Weapon disassembled: ${weaponId} (${playerId}), ${recovered.length} component(s) recovered`);
    return ok({ weaponId, recoveryChance, recovered });
  }

  getCraftedRecord(playerId: string, weaponId: string): CraftedWeaponRecord | undefined {
    return this.records.get(instanceKey(playerId, weaponId));
  }

  listCraftedRecords(): CraftedWeaponRecord[] {
    return [...this.records.values()];
  }

  replaceAll(records: CraftedWeaponRecord[]): void {
    this.records.clear();
    for (const r of records) this.records.set(instanceKey(r.playerId, r.weaponId), r);
  }
}
