import cors from 'cors';
import express from 'express';

import { createApiRoutes, type ApiServices } from './core/routes';
import { errorHandler, notFoundHandler } from './core/shared/middlewares/error-handler';
import { requestIdMiddleware } from './core/shared/middlewares/request-id';
import { requestLoggerMiddleware } from './core/shared/middlewares/request-logger';

export const createApp = (services: ApiServices): express.Express => {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use('/api', createApiRoutes(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
