import { z } from 'zod';

export const ApplyEvolutionBodySchema = z.object({
  evolutionId: z.string().min(1).max(80),
});

export type ApplyEvolutionBody = z.infer<typeof ApplyEvolutionBodySchema>;
