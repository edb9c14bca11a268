// 제작 부품 / 제작 기록

import { z } from 'zod';
import { COMPONENT_CATEGORY, DAMAGE_TYPE, RARITY, WEAPON_CATEGORY } from './enums.js';
import { EffectDescriptorSchema } from './effect.js';
import { NUMERIC_STAT_KEYS } from './weapon.js';

export const ComponentModifiersSchema = z.object({
  /** 가산 델타 */
  stats: z.record(z.enum(NUMERIC_STAT_KEYS), z.number()).default({}),
  damageType: z.enum(DAMAGE_TYPE).optional(),
  newEffect: EffectDescriptorSchema.optional(),
});
export type ComponentModifiers = z.infer<typeof ComponentModifiersSchema>;

export const ComponentSchema = z.object({
  id: z.string().min(1).max(80),
  name: z.string().min(1).max(120),
  description: z.string().max(400).default(''),
  category: z.enum(COMPONENT_CATEGORY),
  rarity: z.enum(RARITY),
  /** 비어 있으면 모든 카테고리와 호환 */
  compatibility: z.array(z.enum(WEAPON_CATEGORY)).default([]),
  modifiers: ComponentModifiersSchema.default({}),
  craftingDifficulty: z.number().min(1).max(10),
});
export type Component = z.infer<typeof ComponentSchema>;
export type ComponentInput = z.input<typeof ComponentSchema>;

/** 슬롯(부품 카테고리) → 부품 id */
export const SlotAssignmentSchema = z.record(z.enum(COMPONENT_CATEGORY), z.string().min(1));
export type SlotAssignment = z.infer<typeof SlotAssignmentSchema>;

export const CraftedWeaponRecordSchema = z.object({
  playerId: z.string().min(1),
  weaponId: z.string().min(1),
  components: SlotAssignmentSchema,
  craftingDifficulty: z.number().int().min(1).max(10),
  /** ISO-8601 */
  craftedAt: z.string(),
});
export type CraftedWeaponRecord = z.infer<typeof CraftedWeaponRecordSchema>;
