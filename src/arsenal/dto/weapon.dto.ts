import { z } from 'zod';
import { RARITY, WEAPON_CATEGORY } from '../../types/index.js';

export const AssignWeaponBodySchema = z.object({
  templateId: z.string().min(1).max(80),
});

export type AssignWeaponBody = z.infer<typeof AssignWeaponBodySchema>;

export const ListTemplatesQuerySchema = z.object({
  category: z.enum(WEAPON_CATEGORY).optional(),
  minRarity: z.enum(RARITY).optional(),
});

export type ListTemplatesQuery = z.infer<typeof ListTemplatesQuerySchema>;

/** 충전/수리량 */
export const ResourceAmountBodySchema = z.object({
  amount: z.number().positive(),
});

export type ResourceAmountBody = z.infer<typeof ResourceAmountBodySchema>;

export const CombatResultBodySchema = z.object({
  damageDealt: z.number().min(0).default(0),
  kills: z.number().int().min(0).default(0),
  criticalHits: z.number().int().min(0).default(0),
  effectsTriggered: z.number().int().min(0).default(0),
});

export type CombatResultBody = z.infer<typeof CombatResultBodySchema>;
