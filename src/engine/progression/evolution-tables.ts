// 무작위 진화: 카테고리별 소형 효과 후보

import type { EffectDescriptorInput, WeaponCategory } from '../../types/index.js';

export const RANDOM_EVOLUTION_KINDS = [
  'DAMAGE_BOOST',
  'ACCURACY_IMPROVEMENT',
  'DURABILITY_INCREASE',
  'CHARGE_ENHANCEMENT',
  'EFFECT_POWER_UP',
  'COOLDOWN_REDUCTION',
  'NEW_MINOR_EFFECT',
] as const;
export type RandomEvolutionKind = (typeof RANDOM_EVOLUTION_KINDS)[number];

/** 생성된 진화의 기본 요구 레벨 */
export const RANDOM_EVOLUTION_LEVEL = 3;

export const ACCURACY_CAP = 0.95;

export const MINOR_EFFECTS: Record<WeaponCategory, EffectDescriptorInput> = {
  ENERGY: {
    id: 'energy_spark',
    name: 'Energy Spark',
    description: 'Chance to deal extra energy damage',
    category: 'DAMAGE',
    damage: 15,
    damageType: 'ENERGY',
    triggerConditions: { triggerChance: 0.25 },
    cooldown: 3,
  },
  MELEE: {
    id: 'bleeding_strike',
    name: 'Bleeding Strike',
    description: 'Chance to make the target bleed',
    category: 'STATUS',
    statusType: 'BLEEDING',
    statusDuration: 3,
    statusStrength: 2,
    applicationChance: 0.3,
    triggerConditions: { triggerChance: 0.3 },
    cooldown: 4,
    duration: 3,
  },
  PROJECTILE: {
    id: 'ricocheting_shot',
    name: 'Ricocheting Shot',
    description: 'Chance for the round to bounce into a second target',
    category: 'DAMAGE',
    damage: 10,
    damageMultiplier: 0.6,
    triggerConditions: { triggerChance: 0.2 },
    cooldown: 5,
  },
  TECH: {
    id: 'system_glitch',
    name: 'System Glitch',
    description: "Chance to scramble the target's systems",
    category: 'STATUS',
    statusType: 'DISORIENTED',
    statusDuration: 2,
    statusStrength: 1,
    applicationChance: 0.25,
    triggerConditions: { triggerChance: 0.25 },
    cooldown: 6,
    duration: 2,
  },
  EXPERIMENTAL: {
    id: 'system_glitch',
    name: 'System Glitch',
    description: "Chance to scramble the target's systems",
    category: 'STATUS',
    statusType: 'DISORIENTED',
    statusDuration: 2,
    statusStrength: 1,
    applicationChance: 0.25,
    triggerConditions: { triggerChance: 0.25 },
    cooldown: 6,
    duration: 2,
  },
};
