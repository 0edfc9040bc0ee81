import { z } from 'zod';

export const sessionIdParamSchema = z.object({
  id: z.string().uuid(),
});

export const createSessionSchema = z.object({
  projectId: z.string().uuid(),
  nodeId: z.string().uuid(),
});

export const postTurnSchema = z.object({
  message: z.string().trim().min(1).max(4000),
});

export type CreateSessionBody = z.infer<typeof createSessionSchema>;
export type PostTurnBody = z.infer<typeof postTurnSchema>;
