export enum Cadence {
  Hourly = "hourly",
  Daily = "daily",
  OnStartup = "on_startup",
  Never = "never",
}

export const DEFAULT_CADENCE = Cadence.Daily;

export function isCadence(value: unknown): value is Cadence {
  return Object.values(Cadence).some((cadence) => cadence === value);
}

/**
 * Parses a configured refresh cadence. Unknown values yield undefined so the
 * caller can reject the entry instead of guessing.
 */
export function parseCadence(value: unknown): Cadence | undefined {
  if (value === undefined || value === null) {
    return DEFAULT_CADENCE;
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return isCadence(normalized) ? normalized : undefined;
}
