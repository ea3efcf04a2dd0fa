import { Router } from 'express';

import { createProfilesController } from './profiles.controller';
import type { ProfilesService } from './profiles.service';

export const createProfilesRoutes = (service: ProfilesService): Router => {
  const router = Router();
  const controller = createProfilesController(service);

  router.get('/:userId', controller.getProfile);
  router.get('/:userId/sessions', controller.listSessions);

  return router;
};
