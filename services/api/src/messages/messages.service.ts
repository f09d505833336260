import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { isValidUsername, MessageDto, ThreadDetailDto, ThreadSummaryDto, WSEventType } from '@courtside/shared';
import { ConversationsService } from './conversations.service';
import { UsersService } from '../users/users.service';
import { MESSAGE_CREATED, MessageCreatedPayload } from './message-events';
import { ThreadEntity } from './thread.entity';
import { counterpartOf, DisplayNames, toMessageDto, toThreadDetail, toThreadSummary } from './thread-views';

/**
 * Messaging use cases on top of the conversation store.
 * Live delivery is handed off as an application event and never fails a send.
 */
@Injectable()
export class MessagesService {
  private readonly logger = new Logger(MessagesService.name);

  constructor(
    private readonly conversations: ConversationsService,
    private readonly usersService: UsersService,
    private readonly eventEmitter: EventEmitter2
  ) {}

  async listThreads(userId: string): Promise<ThreadSummaryDto[]> {
    const overviews = await this.conversations.listThreadsFor(userId);
    const names = await this.displayNames(overviews.map((o) => counterpartOf(o.thread, userId)));
    return overviews.map((overview) => toThreadSummary(overview, userId, names));
  }

  async unreadCount(userId: string): Promise<{ unread: number }> {
    return { unread: await this.conversations.countUnreadFor(userId) };
  }

  async startDirectThread(userId: string, username: string): Promise<ThreadDetailDto> {
    // No account can hold a name outside the username pattern
    const recipient = isValidUsername(username) ? await this.usersService.findByUsername(username) : null;
    if (!recipient) {
      throw new NotFoundException('User not found');
    }
    const thread = await this.conversations.getOrCreateThread(userId, recipient.id);
    return this.buildDetail(thread, userId);
  }

  /**
   * Opens the caller's thread with `ownerId` about `subjectId`
   */
  async startSubjectThread(userId: string, subjectId: string, ownerId: string): Promise<ThreadDetailDto> {
    const owner = await this.usersService.findById(ownerId);
    if (!owner) {
      throw new NotFoundException('Owner not found');
    }
    const thread = await this.conversations.getOrCreateSubjectThread(subjectId, owner.id, userId);
    return this.buildDetail(thread, userId);
  }

  /**
   * Thread with its messages as they were before this view marked them read
   */
  async openThread(threadId: string, userId: string): Promise<ThreadDetailDto> {
    const thread = await this.conversations.getThreadForParticipant(threadId, userId);
    const detail = await this.buildDetail(thread, userId);
    await this.conversations.markRead(threadId, userId);
    return detail;
  }

  async sendMessage(threadId: string, senderId: string, body: string): Promise<MessageDto> {
    const thread = await this.conversations.getThreadForParticipant(threadId, senderId);
    const sender = await this.usersService.findByIdOrFail(senderId);
    const message = await this.conversations.appendMessage(threadId, senderId, body);

    const recipientId = counterpartOf(thread, senderId);
    const payload: MessageCreatedPayload = {
      recipientId,
      event: {
        type: WSEventType.MESSAGE_NEW,
        threadId,
        messageId: message.id,
        senderId,
        senderDisplayName: sender.displayName,
        body: message.body,
        createdAt: message.createdAt.toISOString(),
      },
    };
    try {
      this.eventEmitter.emit(MESSAGE_CREATED, payload);
    } catch (error) {
      this.logger.warn(`Live delivery of ${message.id} failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    return toMessageDto(message, senderId, new Map([[senderId, sender.displayName]]));
  }

  async markRead(threadId: string, userId: string): Promise<{ marked: number }> {
    return { marked: await this.conversations.markRead(threadId, userId) };
  }

  async archiveThread(threadId: string, userId: string): Promise<{ id: string; isActive: boolean }> {
    const thread = await this.conversations.deactivateThread(threadId, userId);
    return { id: thread.id, isActive: thread.isActive };
  }

  private async buildDetail(thread: ThreadEntity, viewerId: string): Promise<ThreadDetailDto> {
    const messages = await this.conversations.listMessages(thread.id, viewerId);
    const names = await this.displayNames([thread.participantAId, thread.participantBId]);
    return toThreadDetail(thread, messages, viewerId, names);
  }

  private async displayNames(userIds: string[]): Promise<DisplayNames> {
    const users = await this.usersService.findByIds([...new Set(userIds)]);
    return new Map(users.map((user) => [user.id, user.displayName]));
  }
}
