import cors from 'cors';
import express from 'express';

import { env } from './config/env';
import { apiRoutes } from './core/routes';
import { errorHandler } from './core/shared/middlewares/error-handler';
import { notFoundHandler } from './core/shared/middlewares/not-found-handler';
import { requestIdMiddleware } from './core/shared/middlewares/request-id';
import { requestLoggerMiddleware } from './core/shared/middlewares/request-logger';

const app = express();

app.disable('x-powered-by');
app.use(requestIdMiddleware);
app.use(requestLoggerMiddleware);
app.use(cors(env.CORS_ORIGIN ? { origin: env.CORS_ORIGIN.split(',').map((origin) => origin.trim()) } : undefined));
app.use(express.json({ limit: '1mb' }));

app.use('/api', apiRoutes);

app.use(notFoundHandler);
app.use(errorHandler);

export { app };
