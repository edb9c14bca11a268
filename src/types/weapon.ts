// 무기 템플릿 / 인스턴스 / 진화 진행도

import { z } from 'zod';
import { DAMAGE_TYPE, RARITY, WEAPON_CATEGORY } from './enums.js';
import {
  EffectDescriptorSchema,
  EffectPatchSchema,
  type EffectDescriptor,
} from './effect.js';

export const WeaponStatsSchema = z.object({
  baseDamage: z.number().min(0),
  damageType: z.enum(DAMAGE_TYPE).default('PHYSICAL'),
  range: z.number().min(0).default(1),
  accuracy: z.number().min(0).max(1).default(0.8),
  maxCharge: z.number().min(0).default(0),
  chargeRate: z.number().min(0).default(0),
  durability: z.number().min(0).default(100),
  weight: z.number().default(0),
  armorPenetration: z.number().min(0).max(1).default(0),
  criticalChance: z.number().min(0).max(1).default(0),
  criticalDamage: z.number().min(0).default(0),
  reloadSpeed: z.number().default(0),
});
export type WeaponStats = z.infer<typeof WeaponStatsSchema>;

/** 수치 스탯 키: 제작 델타/진화 덮어쓰기 대상 */
export const NUMERIC_STAT_KEYS = [
  'baseDamage',
  'range',
  'accuracy',
  'maxCharge',
  'chargeRate',
  'durability',
  'weight',
  'armorPenetration',
  'criticalChance',
  'criticalDamage',
  'reloadSpeed',
] as const;
export type NumericStatKey = (typeof NUMERIC_STAT_KEYS)[number];

export const EvolutionChangesSchema = z.object({
  stats: WeaponStatsSchema.partial().default({}),
  effectChanges: z.record(EffectPatchSchema).default({}),
  newEffect: EffectDescriptorSchema.optional(),
});
export type EvolutionChanges = z.infer<typeof EvolutionChangesSchema>;

export const EvolutionPathSchema = z.object({
  id: z.string().min(1).max(80),
  name: z.string().min(1).max(120),
  description: z.string().max(400).default(''),
  levelRequirement: z.number().int().min(1),
  prerequisites: z.array(z.string()).default([]),
  changes: EvolutionChangesSchema.default({}),
});
export type EvolutionPath = z.infer<typeof EvolutionPathSchema>;

export const WeaponTemplateSchema = z.object({
  id: z.string().min(1).max(80),
  name: z.string().min(1).max(120),
  description: z.string().max(400),
  category: z.enum(WEAPON_CATEGORY),
  rarity: z.enum(RARITY),
  stats: WeaponStatsSchema,
  effects: z.array(EffectDescriptorSchema),
  evolutionPaths: z.array(EvolutionPathSchema).default([]),
  crafted: z.boolean().default(false),
});
export type WeaponTemplate = z.infer<typeof WeaponTemplateSchema>;
/** 등록 입력 (기본값 적용 전) */
export type WeaponTemplateInput = z.input<typeof WeaponTemplateSchema>;

export const WeaponInstanceSchema = z.object({
  playerId: z.string().min(1),
  templateId: z.string().min(1),
  effective: WeaponTemplateSchema,
  currentCharge: z.number().min(0),
  currentDurability: z.number().min(0),
  /** effectId → 쿨다운 만료 시각 */
  cooldowns: z.record(z.number()),
  kills: z.number().int().min(0),
  damageDealt: z.number().min(0),
  specialTriggers: z.number().int().min(0),
});
export type WeaponInstance = z.infer<typeof WeaponInstanceSchema>;

export const EvolutionProgressSchema = z.object({
  level: z.number().int().min(1),
  experience: z.number().min(0),
  nextLevelExp: z.number().int().min(1),
  evolutionsAvailable: z.number().int().min(0),
  appliedEvolutions: z.array(z.string()),
});
export type EvolutionProgress = z.infer<typeof EvolutionProgressSchema>;

export const TargetOutcomeSchema = z.object({
  targetId: z.string(),
  kind: z.string(),
  amount: z.number().optional(),
  applied: z.boolean().optional(),
  detail: z.string().optional(),
});
export type TargetOutcome = z.infer<typeof TargetOutcomeSchema>;

export const ActiveEffectSchema = z.object({
  id: z.string().min(1),
  playerId: z.string().min(1),
  weaponId: z.string().min(1),
  effectId: z.string().min(1),
  effect: EffectDescriptorSchema,
  startTime: z.number().int(),
  endTime: z.number().int(),
  targets: z.array(z.string()),
  results: z.array(TargetOutcomeSchema),
});
export type ActiveEffect = z.infer<typeof ActiveEffectSchema>;

/** 활성화 판정 컨텍스트: 호출자가 채워 넘긴다 */
export interface ActivationContext {
  /** 논리 시각 (턴/전투 시각) */
  time: number;
  targetHealthPercent?: number;
  consecutiveHits?: number;
  enemyCount?: number;
  isCritical?: boolean;
}

export type ActivationFailureReason =
  | 'WEAPON_NOT_FOUND'
  | 'WEAPON_BROKEN'
  | 'NO_EFFECTS'
  | 'ALL_ON_COOLDOWN'
  | 'CONDITIONS_UNMET';

export type ActivationResult =
  | { eligible: true; effects: EffectDescriptor[] }
  | { eligible: false; reason: ActivationFailureReason; message: string };

/** (playerId, weaponId) 복합 키 */
export function instanceKey(playerId: string, weaponId: string): string {
  return `${playerId}::${weaponId}`;
}
