import type { RequestHandler } from 'express';

import type { ApiErrorResponse } from '../../@types';

export const notFoundHandler: RequestHandler = (req, res) => {
  const body: ApiErrorResponse = {
    requestId: req.requestId,
    error: {
      message: `Route ${req.method} ${req.originalUrl} not found.`,
      code: 'ROUTE_NOT_FOUND',
    },
  };

  res.status(404).json(body);
};
