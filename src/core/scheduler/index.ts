/**
 * Scheduler module exports
 */

export { isDue, nextDueAt, SECONDS_PER_DAY, toEpochSeconds } from "./due";
