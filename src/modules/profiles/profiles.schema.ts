import { z } from 'zod';

export const userIdParamSchema = z.object({
  userId: z.string().trim().min(1).max(120),
});

export const listSessionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});
