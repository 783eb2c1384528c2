/**
 * Trading Sessions
 *
 * Session windows are fixed UTC hour ranges, [start, end). A range whose
 * start is after its end wraps past midnight (asian: 23:00-08:00).
 */

import { utcHour, ValidationError } from '@stratlab/core';
import { DEFAULT_SESSIONS, type SessionWindow } from '../config.js';

export function isHourInWindow(hour: number, [start, end]: SessionWindow): boolean {
  if (start <= end) {
    return start <= hour && hour < end;
  }
  return hour >= start || hour < end;
}

/**
 * Names of all sessions active at a UNIX-seconds timestamp, in table order.
 * May be empty.
 */
export function getActiveSessions(
  timestamp: number,
  sessions: Record<string, SessionWindow> = DEFAULT_SESSIONS
): string[] {
  const hour = utcHour(timestamp);
  return Object.entries(sessions)
    .filter(([, window]) => isHourInWindow(hour, window))
    .map(([name]) => name);
}

/**
 * @throws ValidationError for an unknown session name
 */
export function isInSession(
  timestamp: number,
  session: string,
  sessions: Record<string, SessionWindow> = DEFAULT_SESSIONS
): boolean {
  const window = sessions[session];
  if (!window) {
    throw new ValidationError(
      `Unknown session '${session}'. Available: ${Object.keys(sessions).join(', ')}`,
      { session }
    );
  }
  return isHourInWindow(utcHour(timestamp), window);
}
