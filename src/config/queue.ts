import { Queue, ConnectionOptions } from 'bullmq';
import { env } from './env';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { NotificationDispatcher, NotificationJobData } from '../types/notification';

export const QUEUE_NAMES = {
  NOTIFICATION: 'notification',
} as const;

function parseRedisUrl(raw: string): ConnectionOptions {
  const url = new URL(raw);
  const connection: ConnectionOptions = {
    host: url.hostname,
    port: url.port ? parseInt(url.port, 10) : 6379,
    password: url.password ? decodeURIComponent(url.password) : undefined,
  };

  if (url.protocol === 'rediss:') {
    return { ...connection, tls: {} };
  }
  return connection;
}

export const connection = parseRedisUrl(env.REDIS_URL);

// Notifications are side effects of an already-handled message: one attempt, never replayed.
export const notificationQueue = new Queue<NotificationJobData>(QUEUE_NAMES.NOTIFICATION, {
  connection,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: 100,
    removeOnFail: 500,
  },
});

notificationQueue.on('error', (err) => {
  logger.error('Notification queue error', { error: err.message });
});

export async function addNotificationJob(data: NotificationJobData): Promise<void> {
  try {
    await notificationQueue.add(data.type, data);
    logger.info('Notification job queued', { type: data.type, recipient: data.recipient });
  } catch (error) {
    logger.error('Failed to queue notification job', { type: data.type, error: errorMessage(error) });
  }
}

export const queueNotificationDispatcher: NotificationDispatcher = {
  dispatch: addNotificationJob,
};

export async function checkQueueHealth(): Promise<{ status: string; error?: string }> {
  try {
    await notificationQueue.getJobCounts('waiting');
    return { status: 'healthy' };
  } catch (error) {
    return { status: 'unhealthy', error: errorMessage(error) };
  }
}
