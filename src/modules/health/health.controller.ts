import type { RequestHandler } from 'express';

import type { HealthResponse } from '../../core/@types';
import { AppDataSource } from '../../database/data-source';

export const healthCheck: RequestHandler = (_req, res) => {
  const response: HealthResponse = {
    ok: true,
    uptime: process.uptime(),
    database: AppDataSource.isInitialized ? 'connected' : 'disconnected',
  };

  res.status(200).json(response);
};
