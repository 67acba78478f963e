import { Worker, Job } from 'bullmq';
import { connection, QUEUE_NAMES } from '../config/queue';
import { ChannelAdapter } from '../types/channel';
import { NotificationJobData } from '../types/notification';
import { logger } from '../utils/logger';
import { REFERRAL_CREDITED_TEXT } from '../utils/prompts';

export async function processNotification(
  job: Pick<Job<NotificationJobData>, 'id' | 'data'>,
  channel: ChannelAdapter
): Promise<void> {
  const { type, recipient, referral_code } = job.data;
  logger.info('Processing notification', { type, recipient, jobId: job.id });

  switch (type) {
    case 'referral_credited':
      await channel.sendText(recipient, REFERRAL_CREDITED_TEXT);
      logger.info('Referrer notified of credit', { recipient, referral_code });
      break;
    default:
      logger.warn('Unknown notification type', { type: String(type) });
  }
}

export function createNotificationWorker(channel: ChannelAdapter): Worker<NotificationJobData> {
  const worker = new Worker<NotificationJobData>(
    QUEUE_NAMES.NOTIFICATION,
    (job) => processNotification(job, channel),
    { connection, concurrency: 5 }
  );

  worker.on('failed', (job, err) => {
    // Single attempt: a failed notification is logged and not replayed.
    logger.error('Notification job failed', { jobId: job?.id, recipient: job?.data.recipient, error: err.message });
  });

  worker.on('error', (err) => {
    logger.error('Notification worker error', { error: err.message });
  });

  return worker;
}
