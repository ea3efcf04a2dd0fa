import type { RequestHandler } from 'express';

import type { PostTurnBody, StartScenarioBody } from './sessions.schema';
import { postTurnSchema, sessionIdParamSchema, startScenarioSchema } from './sessions.schema';
import type { SessionsService } from './sessions.service';

type SessionAction = 'requestHint' | 'pause' | 'resume' | 'complete';

export const createSessionsController = (service: SessionsService) => {
  const startScenario: RequestHandler<never, unknown, StartScenarioBody> = async (req, res, next) => {
    try {
      const payload = startScenarioSchema.parse(req.body);
      const response = await service.startScenario(payload);
      res.status(201).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  const getSession: RequestHandler<{ id: string }> = (req, res, next) => {
    try {
      const { id } = sessionIdParamSchema.parse(req.params);
      res.status(200).json(service.getSession(id));
    } catch (error: unknown) {
      next(error);
    }
  };

  const postTurn: RequestHandler<{ id: string }, unknown, PostTurnBody> = async (req, res, next) => {
    try {
      const { id } = sessionIdParamSchema.parse(req.params);
      const payload = postTurnSchema.parse(req.body);
      const response = await service.postTurn(id, payload);
      res.status(200).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  const runAction =
    (action: SessionAction): RequestHandler<{ id: string }> =>
    async (req, res, next) => {
      try {
        const { id } = sessionIdParamSchema.parse(req.params);
        const response = await service[action](id);
        res.status(200).json(response);
      } catch (error: unknown) {
        next(error);
      }
    };

  const getRiskAssessment: RequestHandler<{ id: string }> = (req, res, next) => {
    try {
      const { id } = sessionIdParamSchema.parse(req.params);
      res.status(200).json(service.getRiskAssessment(id));
    } catch (error: unknown) {
      next(error);
    }
  };

  return {
    startScenario,
    getSession,
    postTurn,
    requestHint: runAction('requestHint'),
    pause: runAction('pause'),
    resume: runAction('resume'),
    complete: runAction('complete'),
    getRiskAssessment,
  };
};
