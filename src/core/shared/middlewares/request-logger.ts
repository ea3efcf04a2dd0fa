import type { RequestHandler } from 'express';

import { logger } from '../logger';

const SESSION_PATH = /^\/api\/sessions\/([^/?#]+)/;
const PROFILE_PATH = /^\/api\/profiles\/([^/?#]+)/;

const decode = (segment: string): string => {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
};

/** Picks the training session or learner a request is about, so its log lines join that trail. */
export const trainingScope = (path: string): { sessionId?: string; userId?: string } => {
  const session = SESSION_PATH.exec(path)?.[1];

  if (session) {
    return { sessionId: decode(session) };
  }

  const user = PROFILE_PATH.exec(path)?.[1];
  return user ? { userId: decode(user) } : {};
};

export const requestLoggerMiddleware: RequestHandler = (req, res, next) => {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    const meta = {
      requestId: req.requestId,
      method: req.method,
      path: req.originalUrl,
      ...trainingScope(req.originalUrl),
      statusCode: res.statusCode,
      durationMs: Number(durationMs.toFixed(2)),
    };

    if (res.statusCode >= 500) {
      logger.error('http_request', meta);
    } else if (res.statusCode >= 400) {
      logger.warn('http_request', meta);
    } else {
      logger.info('http_request', meta);
    }
  });

  next();
};
