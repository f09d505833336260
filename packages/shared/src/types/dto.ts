/**
 * Courtside - API Data Transfer Objects
 * Response shapes of the conversation and settings endpoints
 */

import { ThreadKind } from '../enums';

/** A message as seen by one participant */
export interface MessageDto {
  id: string;
  threadId: string;
  body: string;
  senderId: string;
  senderDisplayName: string;
  createdAt: string;
  /** True when the viewing user sent the message */
  isMine: boolean;
  isRead: boolean;
}

/** One row of the thread list */
export interface ThreadSummaryDto {
  id: string;
  kind: ThreadKind;
  subjectId: string | null;
  counterpartId: string;
  counterpartDisplayName: string;
  /** True when the viewing user owns the subject of a SUBJECT thread */
  isOwner: boolean;
  isActive: boolean;
  createdAt: string;
  lastActivityAt: string;
  lastMessagePreview: string | null;
  unreadCount: number;
}

/** A thread with its full message history */
export interface ThreadDetailDto {
  id: string;
  kind: ThreadKind;
  subjectId: string | null;
  counterpartId: string;
  counterpartDisplayName: string;
  isOwner: boolean;
  isActive: boolean;
  messages: MessageDto[];
}

/** Reminder and contact settings of the current user */
export interface UserSettingsDto {
  id: string;
  username: string;
  displayName: string;
  email: string | null;
  emailVerified: boolean;
  unreadReminderEnabled: boolean;
  unreadReminderDelayMin: number;
}
