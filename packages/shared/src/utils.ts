/**
 * Courtside - Utility Functions
 * Shared utility functions used across the application
 */

import { REMINDER, VALIDATION } from './constants';

/**
 * Orders two participant IDs so that (a, b) and (b, a) give the same pair
 */
export function sortParticipants(userIdA: string, userIdB: string): [string, string] {
  return userIdA < userIdB ? [userIdA, userIdB] : [userIdB, userIdA];
}

/**
 * Unique key of the direct thread between two users, independent of argument order
 */
export function directThreadKey(userIdA: string, userIdB: string): string {
  const [first, second] = sortParticipants(userIdA, userIdB);
  return `direct:${first}:${second}`;
}

/**
 * Unique key of the thread about `subjectId` between its owner and one counterpart.
 * Owner and counterpart are not interchangeable.
 */
export function subjectThreadKey(subjectId: string, ownerId: string, counterpartId: string): string {
  return `subject:${subjectId}:${ownerId}:${counterpartId}`;
}

/**
 * True for undefined, null, empty and whitespace-only strings
 */
export function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim().length === 0;
}

/**
 * Validates a username against the allowed pattern
 */
export function isValidUsername(username: string): boolean {
  return VALIDATION.USERNAME.test(username);
}

/**
 * Validates a subject identifier
 */
export function isValidSubjectId(subjectId: string): boolean {
  return VALIDATION.SUBJECT_ID.test(subjectId);
}

/**
 * Whether a reminder delay is one of the selectable values
 */
export function isAllowedReminderDelay(minutes: number): boolean {
  return REMINDER.ALLOWED_DELAYS_MIN.some((allowed) => allowed === minutes);
}

/**
 * Truncates a string to a maximum length with ellipsis
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Creates a safe delay promise
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Raised by {@link withTimeout} when the wrapped promise does not settle in time */
export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Races a promise against a timer. The timer is cleared once either side settles.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label = 'Operation'): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  });
}

/**
 * Safely parses JSON, returning undefined on failure
 */
export function safeJsonParse(json: string): unknown {
  try {
    return JSON.parse(json) as unknown;
  } catch {
    return undefined;
  }
}
