import { TimeOfDay } from '../interfaces';

/**
 * Never sleep less than this, even when the configured time is right now
 */
export const MIN_WAIT_SECONDS = 60;

/**
 * Seconds from `now` until the next local occurrence of `time`
 */
export function secondsUntilNextRun(time: TimeOfDay, now: Date = new Date()): number {
  const runAt = new Date(now.getTime());
  runAt.setHours(time.hour, time.minute, 0, 0);

  if (runAt.getTime() <= now.getTime()) {
    runAt.setDate(runAt.getDate() + 1);
  }

  const seconds = Math.floor((runAt.getTime() - now.getTime()) / 1000);
  return Math.max(MIN_WAIT_SECONDS, seconds);
}
