import { z } from 'zod';

import { SCENARIO_TYPES, USER_ROLES } from '../../core/@types';

export const sessionIdParamSchema = z.object({
  id: z.string().uuid(),
});

export const startScenarioSchema = z.object({
  userId: z.string().trim().min(1).max(120),
  scenarioType: z.enum(SCENARIO_TYPES).optional(),
  role: z.enum(USER_ROLES).optional(),
});

export const postTurnSchema = z.object({
  message: z.string().trim().min(1).max(2000),
});

export type StartScenarioBody = z.infer<typeof startScenarioSchema>;
export type PostTurnBody = z.infer<typeof postTurnSchema>;
