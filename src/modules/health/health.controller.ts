import type { RequestHandler } from 'express';

import type { HealthService } from './health.service';

export const createHealthController = (service: HealthService) => {
  const getHealth: RequestHandler = async (_req, res, next) => {
    try {
      const response = await service.getHealth();
      res.status(response.ok ? 200 : 503).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  return { getHealth };
};
