import type { Server } from 'node:http';

import { app } from './app';
import { env } from './config/env';
import { sessionRealtimeBus } from './core/realtime/sessionRealtimeBus';
import { attachSessionWebSocketGateway } from './core/realtime/websocketGateway';
import { logger } from './core/shared/logger';
import { AppDataSource } from './database/data-source';

const bootstrap = async (): Promise<void> => {
  await AppDataSource.initialize();
  logger.info('database_connected', {
    host: env.DB_HOST,
    database: env.DB_NAME,
  });

  const server: Server = app.listen(env.PORT, () => {
    logger.info('server_started', {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
    });
  });

  const webSocketGateway = attachSessionWebSocketGateway(server, sessionRealtimeBus);

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('shutdown_signal_received', { signal });

    try {
      await webSocketGateway.close();

      if (AppDataSource.isInitialized) {
        await AppDataSource.destroy();
      }

      logger.info('shutdown_complete', { signal });
      process.exit(0);
    } catch (error: unknown) {
      logger.error('shutdown_failed', {
        signal,
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
};

void bootstrap().catch((error: unknown) => {
  logger.error('bootstrap_failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
