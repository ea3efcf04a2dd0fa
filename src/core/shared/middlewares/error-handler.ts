import type { ErrorRequestHandler, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';

import type { ApiErrorResponse } from '../../@types';
import { AppError } from '../errors/app-error';
import { logger } from '../logger';

const sendError = (res: Response, statusCode: number, body: ApiErrorResponse): void => {
  res.status(statusCode).json(body);
};

export const notFoundHandler: RequestHandler = (req, res) => {
  sendError(res, 404, {
    requestId: req.requestId,
    error: {
      message: `Route ${req.method} ${req.originalUrl} not found.`,
      code: 'ROUTE_NOT_FOUND',
    },
  });
};

export const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  void _next;

  if (error instanceof ZodError) {
    sendError(res, 400, {
      requestId: req.requestId,
      error: {
        message: 'Validation failed.',
        code: 'VALIDATION_ERROR',
        details: error.flatten(),
      },
    });
    return;
  }

  if (error instanceof SyntaxError && 'body' in error) {
    sendError(res, 400, {
      requestId: req.requestId,
      error: {
        message: 'Request body is not valid JSON.',
        code: 'INVALID_JSON',
      },
    });
    return;
  }

  if (error instanceof AppError) {
    sendError(res, error.statusCode, {
      requestId: req.requestId,
      error: {
        message: error.message,
        code: error.code,
        details: error.details,
      },
    });
    return;
  }

  logger.error('unhandled_error', {
    requestId: req.requestId,
    errorName: error instanceof Error ? error.name : 'UnknownError',
    errorMessage: error instanceof Error ? error.message : String(error),
  });

  sendError(res, 500, {
    requestId: req.requestId,
    error: {
      message: 'Internal server error.',
      code: 'INTERNAL_SERVER_ERROR',
    },
  });
};
