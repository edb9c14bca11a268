// 제작 밸런스 테이블: 카테고리별 기본 스탯 / 기본 효과 / 희귀도 보너스 효과

import type {
  ComponentCategory,
  EffectDescriptorInput,
  Rarity,
  WeaponCategory,
  WeaponStats,
} from '../../types/index.js';

/** 호환 카테고리가 여러 개 남을 때 우선순위 */
export const CATEGORY_PRIORITY: readonly WeaponCategory[] = [
  'EXPERIMENTAL',
  'TECH',
  'ENERGY',
  'PROJECTILE',
  'MELEE',
];

export const REQUIRED_SLOTS: readonly ComponentCategory[] = ['FRAME', 'BARREL'];

export const ACCURACY_RANGE = { min: 0.1, max: 0.98 } as const;
export const MIN_DURABILITY = 30;
export const MIN_BASE_DAMAGE = 5;

export const RECOVERY_BASE = 0.3;
export const RECOVERY_DURABILITY_WEIGHT = 0.5;

export function complexityBonus(componentCount: number): number {
  if (componentCount >= 5) return 2;
  if (componentCount >= 3) return 1;
  return 0;
}

const ZERO_STATS = {
  weight: 0,
  armorPenetration: 0,
  criticalChance: 0,
  criticalDamage: 0,
  reloadSpeed: 0,
};

export const BASE_STATS: Record<WeaponCategory, WeaponStats> = {
  ENERGY: {
    ...ZERO_STATS,
    baseDamage: 20,
    damageType: 'ENERGY',
    range: 18,
    accuracy: 0.8,
    maxCharge: 100,
    chargeRate: 10,
    durability: 100,
    weight: 3,
  },
  MELEE: {
    ...ZERO_STATS,
    baseDamage: 35,
    damageType: 'PHYSICAL',
    range: 2,
    accuracy: 0.9,
    maxCharge: 0,
    chargeRate: 0,
    durability: 120,
    weight: 4,
  },
  PROJECTILE: {
    ...ZERO_STATS,
    baseDamage: 25,
    damageType: 'PHYSICAL',
    range: 20,
    accuracy: 0.75,
    // 탄창 / 재장전 속도
    maxCharge: 30,
    chargeRate: 6,
    durability: 110,
    weight: 5,
  },
  TECH: {
    ...ZERO_STATS,
    baseDamage: 18,
    damageType: 'TECH',
    range: 15,
    accuracy: 0.85,
    maxCharge: 80,
    chargeRate: 12,
    durability: 90,
    weight: 3,
  },
  EXPERIMENTAL: {
    ...ZERO_STATS,
    baseDamage: 30,
    damageType: 'VARIABLE',
    range: 16,
    accuracy: 0.7,
    maxCharge: 120,
    chargeRate: 8,
    durability: 70,
    weight: 6,
  },
};

/** 부품이 효과를 하나도 주지 않을 때 */
export const DEFAULT_EFFECTS: Record<WeaponCategory, EffectDescriptorInput> = {
  ENERGY: {
    id: 'energy_discharge',
    name: 'Energy Discharge',
    description: 'Releases a concentrated burst of energy',
    category: 'DAMAGE',
    damage: 30,
    damageMultiplier: 1.0,
    damageType: 'ENERGY',
    triggerConditions: { minCharge: 50, triggerChance: 1.0 },
    costs: { charge: 50 },
    cooldown: 3,
  },
  MELEE: {
    id: 'power_strike',
    name: 'Power Strike',
    description: 'A blow delivered with extra force',
    category: 'DAMAGE',
    damage: 45,
    damageMultiplier: 1.2,
    damageType: 'PHYSICAL',
    triggerConditions: { triggerChance: 0.3 },
    cooldown: 3,
  },
  PROJECTILE: {
    id: 'precision_shot',
    name: 'Precision Shot',
    description: 'A carefully aimed shot',
    category: 'DAMAGE',
    damage: 35,
    damageMultiplier: 1.5,
    damageType: 'PHYSICAL',
    triggerConditions: { triggerChance: 1.0 },
    cooldown: 4,
  },
  TECH: {
    id: 'system_disruption',
    name: 'System Disruption',
    description: "Temporarily disrupts the target's systems",
    category: 'STATUS',
    statusType: 'DISRUPTED',
    statusDuration: 3,
    statusStrength: 2,
    applicationChance: 0.7,
    triggerConditions: { minCharge: 40, triggerChance: 1.0 },
    costs: { charge: 40 },
    cooldown: 5,
    duration: 3,
  },
  EXPERIMENTAL: {
    id: 'reality_shift',
    name: 'Reality Shift',
    description: 'Briefly bends reality around the target',
    category: 'DAMAGE',
    damage: 40,
    damageMultiplier: 1.3,
    damageType: 'VOID',
    maxTargets: 6,
    aoeRadius: 5,
    triggerConditions: { minCharge: 70, triggerChance: 1.0 },
    costs: { charge: 70, durability: 8 },
    cooldown: 6,
    duration: 3,
  },
};

export type BonusTier = 'minor' | 'major';

/** 희귀도별 보너스 규칙: guaranteed 는 항상, chance 는 확률 판정 후 추가 */
export const RARITY_BONUS_RULES: Record<Rarity, Array<{ tier: BonusTier; chance: number }>> = {
  COMMON: [],
  RARE: [{ tier: 'minor', chance: 0.5 }],
  EPIC: [{ tier: 'minor', chance: 1 }],
  LEGENDARY: [
    { tier: 'minor', chance: 1 },
    { tier: 'major', chance: 0.5 },
  ],
  ARTIFACT: [
    { tier: 'minor', chance: 1 },
    { tier: 'major', chance: 1 },
  ],
};

/** 보너스 효과 후보: id 에는 제작 시 난수 접미사가 붙는다 */
export const BONUS_EFFECTS: Record<WeaponCategory, Record<BonusTier, EffectDescriptorInput[]>> = {
  ENERGY: {
    minor: [
      {
        id: 'energy_feedback',
        name: 'Energy Feedback',
        description: 'Attacks trickle charge back into the weapon',
        category: 'UTILITY',
        utilityType: 'CHARGE_REFUND',
        amount: 10,
        triggerConditions: { triggerChance: 0.4 },
        cooldown: 3,
      },
    ],
    major: [
      {
        id: 'plasma_cascade',
        name: 'Plasma Cascade',
        description: 'Sets off a chain of plasma bursts',
        category: 'DAMAGE',
        damage: 20,
        damageMultiplier: 1.0,
        damageType: 'ENERGY',
        maxTargets: 3,
        aoeRadius: 4,
        triggerConditions: { minCharge: 60, triggerChance: 0.3 },
        costs: { charge: 60 },
        cooldown: 6,
      },
    ],
  },
  MELEE: {
    minor: [
      {
        id: 'stance_shift',
        name: 'Stance Shift',
        description: 'Briefly shifts stance for a sharper follow-up',
        category: 'UTILITY',
        utilityType: 'BOOST',
        stat: 'CRITICAL_CHANCE',
        bonus: 0.15,
        triggerConditions: { triggerChance: 0.3 },
        cooldown: 4,
        duration: 2,
      },
    ],
    major: [
      {
        id: 'whirlwind_attack',
        name: 'Whirlwind Attack',
        description: 'Strikes every nearby enemy in one sweeping motion',
        category: 'DAMAGE',
        damage: 30,
        damageMultiplier: 0.8,
        damageType: 'PHYSICAL',
        maxTargets: 5,
        aoeRadius: 3,
        triggerConditions: { triggerChance: 0.2 },
        cooldown: 8,
      },
    ],
  },
  PROJECTILE: {
    minor: [
      {
        id: 'quick_reload',
        name: 'Quick Reload',
        description: 'Chance to reload faster after a shot',
        category: 'UTILITY',
        utilityType: 'BOOST',
        stat: 'RELOAD_SPEED',
        bonus: 0.5,
        triggerConditions: { triggerChance: 0.3 },
        cooldown: 4,
      },
    ],
    major: [
      {
        id: 'explosive_round',
        name: 'Explosive Round',
        description: 'Fires a round that explodes on impact',
        category: 'DAMAGE',
        damage: 25,
        damageMultiplier: 1.2,
        damageType: 'EXPLOSIVE',
        maxTargets: 4,
        aoeRadius: 3,
        triggerConditions: { triggerChance: 0.2 },
        cooldown: 7,
      },
    ],
  },
  TECH: {
    minor: [
      {
        id: 'targeting_assist',
        name: 'Targeting Assist',
        description: 'Assisted targeting briefly improves accuracy',
        category: 'UTILITY',
        utilityType: 'BOOST',
        stat: 'ACCURACY',
        bonus: 0.15,
        triggerConditions: { triggerChance: 0.4 },
        cooldown: 5,
        duration: 2,
      },
    ],
    major: [
      {
        id: 'system_overload',
        name: 'System Overload',
        description: 'Overloads every system for one devastating shot',
        category: 'DAMAGE',
        damage: 50,
        damageMultiplier: 1.5,
        damageType: 'TECH',
        armorPenetration: 0.3,
        triggerConditions: { minCharge: 80, triggerChance: 0.2 },
        costs: { charge: 80, durability: 5 },
        cooldown: 10,
      },
    ],
  },
  EXPERIMENTAL: {
    minor: [
      {
        id: 'unstable_flux',
        name: 'Unstable Flux',
        description: 'Emits an unstable flux with unpredictable effects',
        category: 'STATUS',
        statusType: 'RANDOM_EFFECT',
        statusDuration: 2,
        statusStrength: 2,
        applicationChance: 0.3,
        triggerConditions: { triggerChance: 0.2 },
        cooldown: 6,
        duration: 2,
      },
    ],
    major: [
      {
        id: 'dimensional_rift',
        name: 'Dimensional Rift',
        description: 'Tears a small rift that damages everything nearby',
        category: 'DAMAGE',
        damage: 35,
        damageMultiplier: 1.3,
        damageType: 'VOID',
        maxTargets: 6,
        aoeRadius: 5,
        triggerConditions: { minCharge: 90, triggerChance: 0.15 },
        costs: { charge: 90, durability: 8 },
        cooldown: 12,
        duration: 3,
      },
    ],
  },
};
