import { z } from 'zod';
import { COMPONENT_CATEGORY, SlotAssignmentSchema } from '../../types/index.js';

export const CraftPreviewBodySchema = z.object({
  slots: SlotAssignmentSchema,
});

export type CraftPreviewBody = z.infer<typeof CraftPreviewBodySchema>;

export const CraftBodySchema = CraftPreviewBodySchema.extend({
  name: z.string().min(1).max(120),
  description: z.string().max(400).default(''),
});

export type CraftBody = z.infer<typeof CraftBodySchema>;

export const ListComponentsQuerySchema = z.object({
  category: z.enum(COMPONENT_CATEGORY).optional(),
});

export type ListComponentsQuery = z.infer<typeof ListComponentsQuerySchema>;
