import { z } from 'zod';
import { COMBAT_ACTION } from '../../types/index.js';

export const BattleActionBodySchema = z.object({
  actorId: z.string().min(1),
  kind: z.enum(COMBAT_ACTION),
  targetId: z.string().min(1).optional(),
  effectId: z.string().min(1).optional(),
});

export type BattleActionBody = z.infer<typeof BattleActionBodySchema>;
