import { Cadence } from "../model/cadence.js";
import { DAY_MS, HOUR_MS } from "../constant.js";

export interface FrequencyPolicyInput {
  cadence: Cadence;
  lastSyncTime: Date | null;
  checkoutExists: boolean;
  now: Date;
  /** Whether this process has already completed a sync of the source */
  syncedThisRun?: boolean;
}

/**
 * A recorded sync later than the current wall clock means the clock moved
 * backwards since it was written.
 */
export function hasClockSkew(lastSyncTime: Date | null, now: Date): boolean {
  return lastSyncTime !== null && lastSyncTime.getTime() > now.getTime();
}

export function needsUpdate(input: FrequencyPolicyInput): boolean {
  const { cadence, lastSyncTime, checkoutExists, now } = input;

  if (!checkoutExists) {
    return true;
  }

  if (lastSyncTime === null) {
    return true;
  }

  switch (cadence) {
    case Cadence.OnStartup:
      return !input.syncedThisRun;
    case Cadence.Hourly:
      return isOlderThan(lastSyncTime, now, HOUR_MS);
    case Cadence.Daily:
      return isOlderThan(lastSyncTime, now, DAY_MS);
    case Cadence.Never:
      return false;
  }
}

/**
 * Only interval cadences look at elapsed time, so only they treat a sync time
 * in the future as stale.
 */
export function usesElapsedTime(cadence: Cadence): boolean {
  return cadence === Cadence.Hourly || cadence === Cadence.Daily;
}

function isOlderThan(lastSyncTime: Date, now: Date, intervalMs: number): boolean {
  if (hasClockSkew(lastSyncTime, now)) {
    return true;
  }
  return now.getTime() - lastSyncTime.getTime() > intervalMs;
}
