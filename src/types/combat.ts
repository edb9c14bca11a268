// 전투 참가자 / 상태이상 / 타임드 modifier

import { z } from 'zod';
import { BOOST_STAT, COMBAT_SIDE, DAMAGE_TYPE, MODIFIER_KIND } from './enums.js';

export const StatusRecordSchema = z.object({
  type: z.string().min(1),
  strength: z.number(),
  startTime: z.number().int(),
  endTime: z.number().int(),
  sourcePlayerId: z.string().optional(),
  sourceWeaponId: z.string().optional(),
  sourceEffectId: z.string().optional(),
});
export type StatusRecord = z.infer<typeof StatusRecordSchema>;

export const TimedModifierSchema = z.object({
  kind: z.enum(MODIFIER_KIND),
  /** SHIELD: 남은 흡수량, STEALTH: 레벨, BOOST: 보너스 */
  value: z.number(),
  stat: z.enum(BOOST_STAT).optional(),
  startTime: z.number().int(),
  endTime: z.number().int(),
  sourceEffectId: z.string().optional(),
});
export type TimedModifier = z.infer<typeof TimedModifierSchema>;

export const CombatantSchema = z.object({
  id: z.string().min(1).max(80),
  name: z.string().min(1).max(120),
  side: z.enum(COMBAT_SIDE),
  health: z.number().min(0),
  maxHealth: z.number().min(1),
  attack: z.number().min(0).default(10),
  damageType: z.enum(DAMAGE_TYPE).default('PHYSICAL'),
  reflexes: z.number().optional(),
  intelligence: z.number().optional(),
  initiative: z.number().optional(),
  position: z.number().default(0),
  /** 피해 타입 → 0~1 (1 이상도 허용, 최소 피해 1) */
  resistances: z.record(z.enum(DAMAGE_TYPE), z.number().min(0)).default({}),
  statusResistances: z.record(z.number().min(0)).default({}),
  canReceiveStatusEffects: z.boolean().default(true),
  /** 상태 타입 → 레코드 (같은 타입은 교체) */
  statuses: z.record(StatusRecordSchema).default({}),
  modifiers: z.array(TimedModifierSchema).default([]),
  equippedWeaponId: z.string().optional(),
});
export type Combatant = z.infer<typeof CombatantSchema>;
export type CombatantInput = z.input<typeof CombatantSchema>;

export function isAlive(c: Combatant): boolean {
  return c.health > 0;
}
