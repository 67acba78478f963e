import * as Sentry from '@sentry/node';
import { createServer } from 'http';
import { env } from './config/env';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';
import { buildServices } from './container';
import { createApp } from './app';
import { attachDashboardGateway } from './gateways/dashboard.gateway';
import { createNotificationWorker } from './workers/notification.worker';

if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

function start() {
  try {
    const services = buildServices();
    const app = createApp(services);
    const server = createServer(app);

    attachDashboardGateway(server, services.broadcast);
    createNotificationWorker(services.channel);

    server.listen(parseInt(env.PORT, 10), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV, channel: services.channel.provider });
    });
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

start();
