/**
 * Courtside - Live Event Types
 * Payloads pushed to clients over live connections
 */

import { WSEventType } from '../enums';

/** A new message was appended to a thread the recipient participates in */
export interface NewMessageEvent {
  type: WSEventType.MESSAGE_NEW;
  threadId: string;
  messageId: string;
  senderId: string;
  senderDisplayName: string;
  body: string;
  /** ISO-8601 creation time of the message */
  createdAt: string;
}

/** Any event delivered through the live-connection path */
export type LiveEvent = NewMessageEvent;

/** Handshake acknowledgement sent once a connection is authenticated */
export interface AuthenticatedEvent {
  userId: string;
  username: string;
}
