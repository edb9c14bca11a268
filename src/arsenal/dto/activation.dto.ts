import { z } from 'zod';

export const ActivationContextSchema = z.object({
  time: z.number().int().min(0),
  targetHealthPercent: z.number().min(0).max(100).optional(),
  consecutiveHits: z.number().int().min(0).optional(),
  enemyCount: z.number().int().min(0).optional(),
  isCritical: z.boolean().optional(),
});

export type ActivationContextBody = z.infer<typeof ActivationContextSchema>;

export const TriggerBodySchema = ActivationContextSchema.extend({
  effectId: z.string().min(1).max(80),
  targets: z.array(z.string().min(1)).max(20).optional(),
});

export type TriggerBody = z.infer<typeof TriggerBodySchema>;
