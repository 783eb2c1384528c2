import { DateTime } from 'luxon';

/**
 * UTC DateTime for a UNIX-seconds timestamp
 */
export function fromUnixSeconds(timestamp: number): DateTime {
  return DateTime.fromSeconds(timestamp, { zone: 'utc' });
}

/**
 * UTC hour (0-23) of a UNIX-seconds timestamp
 */
export function utcHour(timestamp: number): number {
  return fromUnixSeconds(timestamp).hour;
}

/**
 * ISO-8601 string for logs and reports
 */
export function toIsoUtc(timestamp: number): string {
  return fromUnixSeconds(timestamp).toISO() ?? String(timestamp);
}
