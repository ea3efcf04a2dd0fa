import { Router } from 'express';

import { createHealthController } from './health.controller';
import type { HealthService } from './health.service';

export const createHealthRoutes = (service: HealthService): Router => {
  const router = Router();
  const controller = createHealthController(service);

  router.get('/', controller.getHealth);

  return router;
};
