import { Router } from 'express';

import { createHealthRoutes } from '../../modules/health/health.routes';
import type { HealthService } from '../../modules/health/health.service';
import { createProfilesRoutes } from '../../modules/profiles/profiles.routes';
import type { ProfilesService } from '../../modules/profiles/profiles.service';
import { createSessionsRoutes } from '../../modules/sessions/sessions.routes';
import type { SessionsService } from '../../modules/sessions/sessions.service';

export interface ApiServices {
  health: HealthService;
  sessions: SessionsService;
  profiles: ProfilesService;
}

export const createApiRoutes = (services: ApiServices): Router => {
  const router = Router();

  router.use('/health', createHealthRoutes(services.health));
  router.use('/sessions', createSessionsRoutes(services.sessions));
  router.use('/profiles', createProfilesRoutes(services.profiles));

  return router;
};
