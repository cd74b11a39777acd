import type { DateTime } from 'luxon';

/**
 * ISO 8601 string for a valid DateTime
 *
 * @throws Error if the DateTime is invalid (Luxon returns null for those)
 */
export function toIsoString(dateTime: DateTime): string {
  const iso = dateTime.toISO();
  if (iso === null) {
    throw new Error(`Invalid timestamp: ${dateTime.invalidExplanation ?? 'unknown reason'}`);
  }
  return iso;
}
