import { Router } from 'express';

import { createSessionsController } from './sessions.controller';
import type { SessionsService } from './sessions.service';

export const createSessionsRoutes = (service: SessionsService): Router => {
  const router = Router();
  const controller = createSessionsController(service);

  router.post('/', controller.startScenario);
  router.get('/:id', controller.getSession);
  router.post('/:id/turn', controller.postTurn);
  router.post('/:id/hint', controller.requestHint);
  router.post('/:id/pause', controller.pause);
  router.post('/:id/resume', controller.resume);
  router.post('/:id/complete', controller.complete);
  router.get('/:id/risk', controller.getRiskAssessment);

  return router;
};
