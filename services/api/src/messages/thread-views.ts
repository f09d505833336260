import { MESSAGE, MessageDto, ThreadDetailDto, ThreadKind, ThreadSummaryDto, truncate } from '@courtside/shared';
import { ThreadEntity } from './thread.entity';
import { MessageEntity } from './message.entity';
import { ThreadOverview } from './conversations.service';

/** Display names by user ID */
export type DisplayNames = ReadonlyMap<string, string>;

const UNKNOWN_USER = 'Unknown user';

export function counterpartOf(thread: ThreadEntity, viewerId: string): string {
  return thread.participantAId === viewerId ? thread.participantBId : thread.participantAId;
}

/** Owners are always participant A of a SUBJECT thread */
export function isOwner(thread: ThreadEntity, viewerId: string): boolean {
  return thread.kind === ThreadKind.SUBJECT && thread.participantAId === viewerId;
}

export function toMessageDto(message: MessageEntity, viewerId: string, names: DisplayNames): MessageDto {
  return {
    id: message.id,
    threadId: message.threadId,
    body: message.body,
    senderId: message.senderId,
    senderDisplayName: names.get(message.senderId) ?? UNKNOWN_USER,
    createdAt: message.createdAt.toISOString(),
    isMine: message.senderId === viewerId,
    isRead: message.readAt !== null,
  };
}

export function toThreadSummary(overview: ThreadOverview, viewerId: string, names: DisplayNames): ThreadSummaryDto {
  const { thread, latestMessage, unreadCount } = overview;
  const counterpartId = counterpartOf(thread, viewerId);
  return {
    id: thread.id,
    kind: thread.kind,
    subjectId: thread.subjectId,
    counterpartId,
    counterpartDisplayName: names.get(counterpartId) ?? UNKNOWN_USER,
    isOwner: isOwner(thread, viewerId),
    isActive: thread.isActive,
    createdAt: thread.createdAt.toISOString(),
    lastActivityAt: thread.lastActivityAt.toISOString(),
    lastMessagePreview: latestMessage ? truncate(latestMessage.body, MESSAGE.PREVIEW_LENGTH) : null,
    unreadCount,
  };
}

export function toThreadDetail(
  thread: ThreadEntity,
  messages: MessageEntity[],
  viewerId: string,
  names: DisplayNames
): ThreadDetailDto {
  const counterpartId = counterpartOf(thread, viewerId);
  return {
    id: thread.id,
    kind: thread.kind,
    subjectId: thread.subjectId,
    counterpartId,
    counterpartDisplayName: names.get(counterpartId) ?? UNKNOWN_USER,
    isOwner: isOwner(thread, viewerId),
    isActive: thread.isActive,
    messages: messages.map((message) => toMessageDto(message, viewerId, names)),
  };
}
