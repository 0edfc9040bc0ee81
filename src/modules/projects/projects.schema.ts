import { z } from 'zod';

export const projectIdParamSchema = z.object({
  id: z.string().uuid(),
});

export const nextNodesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(10).optional(),
});

export type NextNodesQuery = z.infer<typeof nextNodesQuerySchema>;
