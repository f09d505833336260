/**
 * Courtside - Protocol Enums
 * Defines constants and enumerations for conversations and live delivery
 */

/** Kinds of conversation threads */
export enum ThreadKind {
  /** Direct message between two users */
  DIRECT = 'DIRECT',
  /** Thread between an item's owner and another manager, about that item */
  SUBJECT = 'SUBJECT',
}

/** WebSocket event types */
export enum WSEventType {
  // Connection events
  AUTHENTICATED = 'authenticated',
  AUTH_ERROR = 'auth_error',
  PING = 'ping',
  PONG = 'pong',

  // Message events
  MESSAGE_NEW = 'dm:new_message',
}

/** Delays (minutes) a user may choose before an unread message triggers a reminder */
export enum ReminderDelay {
  HALF_HOUR = 30,
  ONE_HOUR = 60,
  THREE_HOURS = 180,
}
