import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, IsNull, Not, Repository } from 'typeorm';
import { randomUUID } from 'crypto';
import {
  MESSAGE,
  ThreadKind,
  directThreadKey,
  isBlank,
  isValidSubjectId,
  sortParticipants,
  subjectThreadKey,
} from '@courtside/shared';
import { ThreadEntity } from './thread.entity';
import { MessageEntity } from './message.entity';

/** Attempts before an append loses to contention for good */
const MAX_APPEND_ATTEMPTS = 5;

export interface ThreadOverview {
  thread: ThreadEntity;
  latestMessage: MessageEntity | null;
  unreadCount: number;
}

export interface UnreadFilter {
  /** Only count messages created at or before this instant */
  olderThan?: Date;
}

type NewThread = Pick<ThreadEntity, 'kind' | 'participantKey' | 'participantAId' | 'participantBId' | 'subjectId'>;

/** Thrown inside an append transaction when another append won the race */
class StaleThreadError extends Error {
  constructor(threadId: string) {
    super(`Thread ${threadId} changed during append`);
    this.name = 'StaleThreadError';
  }
}

/**
 * Conversation Store.
 *
 * Owns threads and messages. Appends on one thread are serialized by a
 * compare-and-swap on `messageCount`; thread creation races are settled by
 * the unique participant key.
 */
@Injectable()
export class ConversationsService {
  private readonly logger = new Logger(ConversationsService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    @InjectRepository(ThreadEntity)
    private readonly threadRepository: Repository<ThreadEntity>,
    @InjectRepository(MessageEntity)
    private readonly messageRepository: Repository<MessageEntity>
  ) {}

  // ==================== THREADS ====================

  /**
   * Returns the active direct thread between two users, creating one when
   * there is none.
   * Argument order does not matter.
   */
  async getOrCreateThread(partyA: string, partyB: string): Promise<ThreadEntity> {
    if (isBlank(partyA) || isBlank(partyB)) {
      throw new BadRequestException('Both participants are required');
    }
    if (partyA === partyB) {
      throw new BadRequestException('Cannot DM yourself');
    }

    const [first, second] = sortParticipants(partyA, partyB);
    return this.findOrInsert({
      kind: ThreadKind.DIRECT,
      participantKey: directThreadKey(first, second),
      participantAId: first,
      participantBId: second,
      subjectId: null,
    });
  }

  /**
   * Returns the thread between an item's owner and one counterpart about
   * that item, creating one when no active thread exists.
   */
  async getOrCreateSubjectThread(subjectId: string, ownerId: string, counterpartId: string): Promise<ThreadEntity> {
    if (isBlank(ownerId) || isBlank(counterpartId)) {
      throw new BadRequestException('Both participants are required');
    }
    if (!isValidSubjectId(subjectId)) {
      throw new BadRequestException('Invalid subject ID');
    }
    if (ownerId === counterpartId) {
      throw new BadRequestException('Cannot message yourself about your own item');
    }

    return this.findOrInsert({
      kind: ThreadKind.SUBJECT,
      participantKey: subjectThreadKey(subjectId, ownerId, counterpartId),
      participantAId: ownerId,
      participantBId: counterpartId,
      subjectId,
    });
  }

  /**
   * Loads a thread the user takes part in
   */
  async getThreadForParticipant(threadId: string, userId: string): Promise<ThreadEntity> {
    const thread = await this.threadRepository.findOne({ where: { id: threadId } });
    return this.assertParticipant(thread, userId);
  }

  /**
   * Threads of a user, most recently active first
   */
  async listThreadsFor(userId: string): Promise<ThreadOverview[]> {
    const threads = await this.threadRepository.find({
      where: [{ participantAId: userId }, { participantBId: userId }],
      order: { lastActivityAt: 'DESC' },
    });
    if (threads.length === 0) {
      return [];
    }

    const unreadRows = await this.messageRepository
      .createQueryBuilder('m')
      .select('m.threadId', 'threadId')
      .addSelect('COUNT(*)', 'count')
      .where('m.threadId IN (:...threadIds)', { threadIds: threads.map((t) => t.id) })
      .andWhere('m.senderId != :userId', { userId })
      .andWhere('m.readAt IS NULL')
      .groupBy('m.threadId')
      .getRawMany<{ threadId: string; count: string | number }>();
    const unreadByThread = new Map(unreadRows.map((row) => [row.threadId, Number(row.count)]));

    const latestMessages = await Promise.all(
      threads.map((thread) =>
        this.messageRepository.findOne({
          where: { threadId: thread.id },
          order: { createdAt: 'DESC' },
        })
      )
    );

    return threads.map((thread, i) => ({
      thread,
      latestMessage: latestMessages[i],
      unreadCount: unreadByThread.get(thread.id) ?? 0,
    }));
  }

  /**
   * Stops further appends. Existing messages stay readable.
   */
  async deactivateThread(threadId: string, actorId: string): Promise<ThreadEntity> {
    const thread = await this.getThreadForParticipant(threadId, actorId);
    if (thread.isActive) {
      await this.threadRepository.update(thread.id, { isActive: false });
      thread.isActive = false;
    }
    return thread;
  }

  // ==================== MESSAGES ====================

  /**
   * Stores a message and advances the thread's activity time.
   *
   * createdAt is max(now, lastActivityAt + 1ms), so creation times strictly
   * increase within a thread even when the clock stalls.
   */
  async appendMessage(threadId: string, senderId: string, body: string): Promise<MessageEntity> {
    const text = body.trim();
    if (!text) {
      throw new BadRequestException('Message body cannot be empty');
    }
    if (text.length > MESSAGE.MAX_LENGTH) {
      throw new BadRequestException(`Message body exceeds ${MESSAGE.MAX_LENGTH} characters`);
    }

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.tryAppend(threadId, senderId, text);
      } catch (error) {
        if (!(error instanceof StaleThreadError)) {
          throw error;
        }
        if (attempt >= MAX_APPEND_ATTEMPTS) {
          this.logger.warn(`Append to ${threadId} lost ${attempt} races, giving up`);
          throw new ConflictException('Thread is busy, please retry');
        }
        this.logger.debug(`Append to ${threadId} lost a race (attempt ${attempt}), retrying`);
      }
    }
  }

  /**
   * Messages of a thread in creation order
   */
  async listMessages(threadId: string, userId: string): Promise<MessageEntity[]> {
    await this.getThreadForParticipant(threadId, userId);
    return this.messageRepository.find({
      where: { threadId },
      order: { createdAt: 'ASC' },
    });
  }

  /**
   * Marks the reader's unread, not self-authored messages as read.
   * Returns how many were updated; repeating the call returns 0.
   */
  async markRead(threadId: string, readerId: string): Promise<number> {
    const thread = await this.getThreadForParticipant(threadId, readerId);
    const readAt = new Date(Math.max(Date.now(), thread.lastActivityAt.getTime()));

    const result = await this.messageRepository.update(
      { threadId, senderId: Not(readerId), readAt: IsNull() },
      { readAt }
    );
    return result.affected ?? 0;
  }

  /**
   * Unread messages addressed to the user across all threads
   */
  async countUnreadFor(userId: string, filter: UnreadFilter = {}): Promise<number> {
    const query = this.messageRepository
      .createQueryBuilder('m')
      .innerJoin(ThreadEntity, 't', 't.id = m.threadId')
      .where('(t.participantAId = :userId OR t.participantBId = :userId)', { userId })
      .andWhere('m.senderId != :userId', { userId })
      .andWhere('m.readAt IS NULL');

    if (filter.olderThan) {
      query.andWhere('m.createdAt <= :cutoff', { cutoff: this.toStoredTimestamp(filter.olderThan) });
    }
    return query.getCount();
  }

  // ==================== INTERNALS ====================

  private async findOrInsert(values: NewThread): Promise<ThreadEntity> {
    const active = { participantKey: values.participantKey, isActive: true };
    const existing = await this.threadRepository.findOne({ where: active });
    if (existing) {
      return existing;
    }

    const now = new Date();
    // A concurrent creator may insert first; the unique active key makes this a no-op then
    await this.threadRepository
      .createQueryBuilder()
      .insert()
      .into(ThreadEntity)
      .values({
        id: randomUUID(),
        ...values,
        isActive: true,
        messageCount: 0,
        createdAt: now,
        lastActivityAt: now,
      })
      .orIgnore()
      .updateEntity(false)
      .execute();

    return this.threadRepository.findOneOrFail({ where: active });
  }

  private async tryAppend(threadId: string, senderId: string, text: string): Promise<MessageEntity> {
    return this.dataSource.transaction(async (manager) => {
      const found = await manager.findOne(ThreadEntity, { where: { id: threadId } });
      const thread = this.assertParticipant(found, senderId);
      if (!thread.isActive) {
        throw new BadRequestException('Thread is archived');
      }

      const createdAt = new Date(Math.max(Date.now(), thread.lastActivityAt.getTime() + 1));
      const swap = await manager.update(
        ThreadEntity,
        { id: threadId, messageCount: thread.messageCount },
        { messageCount: thread.messageCount + 1, lastActivityAt: createdAt }
      );
      if (!swap.affected) {
        throw new StaleThreadError(threadId);
      }

      const message = manager.create(MessageEntity, {
        id: randomUUID(),
        threadId,
        senderId,
        body: text,
        createdAt,
        readAt: null,
      });
      await manager.insert(MessageEntity, message);
      return message;
    });
  }

  private assertParticipant(thread: ThreadEntity | null, userId: string): ThreadEntity {
    if (!thread) {
      throw new NotFoundException('Thread not found');
    }
    if (thread.participantAId !== userId && thread.participantBId !== userId) {
      throw new ForbiddenException('Not a participant in this thread');
    }
    return thread;
  }

  /** Binds a Date in the storage format of the messages.createdAt column */
  private toStoredTimestamp(date: Date): unknown {
    const column = this.messageRepository.metadata.findColumnWithPropertyName('createdAt');
    return column ? this.dataSource.driver.preparePersistentValue(date, column) : date;
  }
}
