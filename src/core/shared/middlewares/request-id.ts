import { randomUUID } from 'node:crypto';

import type { RequestHandler } from 'express';

const MAX_REQUEST_ID_LENGTH = 128;

export const requestIdMiddleware: RequestHandler = (req, res, next) => {
  const incoming = req.header('x-request-id')?.trim();
  req.requestId = incoming && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : randomUUID();
  res.setHeader('x-request-id', req.requestId);
  next();
};
