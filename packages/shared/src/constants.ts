/**
 * Courtside - Constants
 * Shared constants used across the application
 */

import { ReminderDelay } from './enums';

/** API configuration */
export const API = {
  /** Default API port */
  DEFAULT_PORT: 3001,
  /** API base path */
  BASE_PATH: '/api/v1',
  /** WebSocket namespace */
  WS_NAMESPACE: '/ws',
} as const;

/** Message configuration */
export const MESSAGE = {
  /** Maximum message body length */
  MAX_LENGTH: 4000,
  /** Length of the last-message preview in thread lists */
  PREVIEW_LENGTH: 120,
} as const;

/** Cross-process fanout configuration */
export const FANOUT = {
  /** Default pub/sub channel for live events */
  CHANNEL: 'dm:events',
  /** First delay before retrying a failed subscribe; doubles per attempt */
  SUBSCRIBE_RETRY_BASE_MS: 500,
  /** Upper bound on the subscribe retry delay */
  SUBSCRIBE_RETRY_MAX_MS: 30000,
  /** Upper bound on the Redis reconnect delay */
  RECONNECT_MAX_MS: 3000,
} as const;

/** Unread reminder configuration */
export const REMINDER = {
  /** Delays a user may choose, in minutes */
  ALLOWED_DELAYS_MIN: [ReminderDelay.HALF_HOUR, ReminderDelay.ONE_HOUR, ReminderDelay.THREE_HOURS],
  /** Delay used until the user picks one */
  DEFAULT_DELAY_MIN: ReminderDelay.ONE_HOUR,
  /** Minimum gap between two reminders to the same user (24 hours) */
  COOLDOWN_MS: 24 * 60 * 60 * 1000,
  /** How long a runner's claim on a user lasts if it never reports back (10 minutes) */
  CLAIM_LEASE_MS: 10 * 60 * 1000,
  /** Default scheduler interval in minutes */
  DEFAULT_INTERVAL_MIN: 15,
  /** Default bound on a single reminder send */
  DEFAULT_SEND_TIMEOUT_MS: 15000,
} as const;

/** Validation patterns */
export const VALIDATION = {
  /** Username pattern: 3-32 chars, alphanumeric and underscores */
  USERNAME: /^[a-zA-Z0-9_]{3,32}$/,
  /** Subject identifier: 1-64 chars, no separators used in participant keys */
  SUBJECT_ID: /^[A-Za-z0-9_-]{1,64}$/,
} as const;
