import type { RequestHandler } from 'express';

import { listSessionsQuerySchema, userIdParamSchema } from './profiles.schema';
import type { ProfilesService } from './profiles.service';

export const createProfilesController = (service: ProfilesService) => {
  const getProfile: RequestHandler<{ userId: string }> = async (req, res, next) => {
    try {
      const { userId } = userIdParamSchema.parse(req.params);
      const response = await service.getProfile(userId);
      res.status(200).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  const listSessions: RequestHandler<{ userId: string }, unknown, never, { limit?: string }> = async (
    req,
    res,
    next,
  ) => {
    try {
      const { userId } = userIdParamSchema.parse(req.params);
      const { limit } = listSessionsQuerySchema.parse(req.query);
      const response = await service.listSessions(userId, limit);
      res.status(200).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  return { getProfile, listSessions };
};
