import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';

import type { ApiErrorResponse } from '../../@types';
import { AppError } from '../errors/app-error';
import { logger } from '../logger';

export const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  void _next;

  if (error instanceof ZodError) {
    const body: ApiErrorResponse = {
      requestId: req.requestId,
      error: {
        message: 'Validation failed.',
        code: 'VALIDATION_ERROR',
        details: error.flatten(),
      },
    };
    res.status(400).json(body);
    return;
  }

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error('request_failed', {
        requestId: req.requestId,
        statusCode: error.statusCode,
        code: error.code,
        errorMessage: error.message,
      });
    }

    const body: ApiErrorResponse = {
      requestId: req.requestId,
      error: {
        message: error.message,
        code: error.code,
        details: error.details,
      },
    };
    res.status(error.statusCode).json(body);
    return;
  }

  // express.json() reports unparsable bodies with a status of 400.
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    const body: ApiErrorResponse = {
      requestId: req.requestId,
      error: {
        message: 'Request body is not valid JSON.',
        code: 'INVALID_JSON',
      },
    };
    res.status(400).json(body);
    return;
  }

  logger.error('unhandled_error', {
    requestId: req.requestId,
    errorName: error instanceof Error ? error.name : 'UnknownError',
    errorMessage: error instanceof Error ? error.message : String(error),
  });

  const body: ApiErrorResponse = {
    requestId: req.requestId,
    error: {
      message: 'Internal server error.',
      code: 'INTERNAL_SERVER_ERROR',
    },
  };
  res.status(500).json(body);
};
