/**
 * Interval-based due check.
 *
 * An object is due once `intervalDays` whole days have elapsed since its last
 * successful backup. Missed runs are not queued: each call only answers
 * whether a backup is due at `now`.
 */

export const SECONDS_PER_DAY = 86_400;

/**
 * Epoch second at which an object last run at `lastRun` becomes due
 */
export function nextDueAt(lastRun: number, intervalDays: number): number {
  return lastRun + intervalDays * SECONDS_PER_DAY;
}

/**
 * @param now - epoch seconds
 * @param lastRun - epoch seconds of the last success, 0 if never run
 */
export function isDue(now: number, lastRun: number, intervalDays: number): boolean {
  if (intervalDays === 0) return true;
  return now >= nextDueAt(lastRun, intervalDays);
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
