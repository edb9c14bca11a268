// 특수 효과 디스크립터: category/utilityType 태그드 유니온

import { z } from 'zod';
import { BOOST_STAT, DAMAGE_TYPE } from './enums.js';

export const TriggerConditionsSchema = z.object({
  minCharge: z.number().min(0).optional(),
  /** 대상 HP% 가 이 값 미만일 때만 */
  targetHealthBelow: z.number().min(0).max(100).optional(),
  consecutiveHits: z.number().int().min(0).optional(),
  enemyCount: z.number().int().min(0).optional(),
  requiresCritical: z.boolean().optional(),
  /** 0~1 확률, 마지막에 판정 */
  triggerChance: z.number().min(0).max(1).optional(),
});
export type TriggerConditions = z.infer<typeof TriggerConditionsSchema>;

export const EffectCostsSchema = z.object({
  charge: z.number().min(0).default(0),
  durability: z.number().min(0).default(0),
});
export type EffectCosts = z.infer<typeof EffectCostsSchema>;

const effectBaseShape = {
  id: z.string().min(1).max(80),
  name: z.string().min(1).max(120),
  description: z.string().max(400).default(''),
  rarity: z.number().int().min(1).max(5).default(1),
  maxTargets: z.number().int().min(1).default(1),
  triggerConditions: TriggerConditionsSchema.default({}),
  costs: EffectCostsSchema.default({}),
  cooldown: z.number().int().min(0).default(0),
  duration: z.number().int().min(1).default(1),
};

export const DamageEffectSchema = z.object({
  ...effectBaseShape,
  category: z.literal('DAMAGE'),
  damage: z.number().min(0).default(0),
  damageMultiplier: z.number().min(0).default(1),
  damageType: z.enum(DAMAGE_TYPE).optional(),
  armorPenetration: z.number().min(0).max(1).default(0),
  aoeRadius: z.number().min(0).default(0),
});

export const StatusEffectSchema = z.object({
  ...effectBaseShape,
  category: z.literal('STATUS'),
  statusType: z.string().min(1).max(40),
  statusDuration: z.number().int().min(1).default(3),
  statusStrength: z.number().min(0).default(1),
  applicationChance: z.number().min(0).max(1).default(1),
});

const utilityShape = { ...effectBaseShape, category: z.literal('UTILITY') };

export const TeleportEffectSchema = z.object({
  ...utilityShape,
  utilityType: z.literal('TELEPORT'),
  distance: z.number().min(0).default(5),
  direction: z.string().min(1).default('FORWARD'),
});

export const StealthEffectSchema = z.object({
  ...utilityShape,
  utilityType: z.literal('STEALTH'),
  level: z.number().int().min(1).default(1),
});

export const ShieldEffectSchema = z.object({
  ...utilityShape,
  utilityType: z.literal('SHIELD'),
  amount: z.number().min(0).default(50),
});

export const ScanEffectSchema = z.object({
  ...utilityShape,
  utilityType: z.literal('SCAN'),
  range: z.number().min(0).default(10),
  revealWeakness: z.boolean().default(false),
});

export const HealEffectSchema = z.object({
  ...utilityShape,
  utilityType: z.literal('HEAL'),
  amount: z.number().min(0).default(20),
  percentage: z.number().min(0).max(1).default(0),
});

export const ChargeRefundEffectSchema = z.object({
  ...utilityShape,
  utilityType: z.literal('CHARGE_REFUND'),
  amount: z.number().min(0).default(10),
});

export const BoostEffectSchema = z.object({
  ...utilityShape,
  utilityType: z.literal('BOOST'),
  stat: z.enum(BOOST_STAT),
  bonus: z.number(),
});

export const EffectDescriptorSchema = z.union([
  DamageEffectSchema,
  StatusEffectSchema,
  TeleportEffectSchema,
  StealthEffectSchema,
  ShieldEffectSchema,
  ScanEffectSchema,
  HealEffectSchema,
  ChargeRefundEffectSchema,
  BoostEffectSchema,
]);

export type DamageEffect = z.infer<typeof DamageEffectSchema>;
export type StatusEffect = z.infer<typeof StatusEffectSchema>;
export type TeleportEffect = z.infer<typeof TeleportEffectSchema>;
export type StealthEffect = z.infer<typeof StealthEffectSchema>;
export type ShieldEffect = z.infer<typeof ShieldEffectSchema>;
export type ScanEffect = z.infer<typeof ScanEffectSchema>;
export type HealEffect = z.infer<typeof HealEffectSchema>;
export type ChargeRefundEffect = z.infer<typeof ChargeRefundEffectSchema>;
export type BoostEffect = z.infer<typeof BoostEffectSchema>;
export type UtilityEffect =
  | TeleportEffect
  | StealthEffect
  | ShieldEffect
  | ScanEffect
  | HealEffect
  | ChargeRefundEffect
  | BoostEffect;
export type EffectDescriptor = z.infer<typeof EffectDescriptorSchema>;
export type EffectDescriptorInput = z.input<typeof EffectDescriptorSchema>;

/** 진화 시 기존 효과에 키 단위로 병합되는 패치 */
export const EffectPatchSchema = z.record(
  z.union([
    z.number(),
    z.string(),
    z.boolean(),
    z.record(z.union([z.number(), z.boolean()])),
  ]),
);
export type EffectPatch = z.infer<typeof EffectPatchSchema>;
