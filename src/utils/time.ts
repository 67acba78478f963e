import { DateTime } from 'luxon';
import { env } from '../config/env';

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/** Wall-clock time in the channel's zone, the format every stored message carries. */
export function channelTimestamp(now: DateTime = DateTime.now()): string {
  return now.setZone(env.CHANNEL_TIMEZONE).toFormat(TIMESTAMP_FORMAT);
}
