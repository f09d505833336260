import { Test, TestingModule } from '@nestjs/testing';
import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { ThreadKind, delay } from '@courtside/shared';
import { ConversationsService } from '../conversations.service';
import { ThreadEntity } from '../thread.entity';
import { MessageEntity } from '../message.entity';
import { inMemoryDatabase } from '../../testing/database';

// Fixed-width IDs so lexicographic order is obvious
const ALICE = '00000000-0000-4000-8000-00000000000a';
const BOB = '00000000-0000-4000-8000-00000000000b';
const CAROL = '00000000-0000-4000-8000-00000000000c';

describe('ConversationsService', () => {
  let module: TestingModule;
  let store: ConversationsService;
  let threads: Repository<ThreadEntity>;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [inMemoryDatabase(), TypeOrmModule.forFeature([ThreadEntity, MessageEntity])],
      providers: [ConversationsService],
    }).compile();

    store = module.get(ConversationsService);
    threads = module.get(getRepositoryToken(ThreadEntity));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await module.close();
  });

  // ==================== THREADS ====================

  describe('getOrCreateThread', () => {
    it('should return the same thread regardless of argument order', async () => {
      const first = await store.getOrCreateThread(BOB, ALICE);
      const second = await store.getOrCreateThread(ALICE, BOB);

      expect(second.id).toBe(first.id);
      expect(first.kind).toBe(ThreadKind.DIRECT);
      expect(first.participantAId).toBe(ALICE);
      expect(first.participantBId).toBe(BOB);
      expect(first.participantKey).toBe(`direct:${ALICE}:${BOB}`);
      expect(first.isActive).toBe(true);
      expect(first.messageCount).toBe(0);
    });

    it('should converge concurrent creators on one row', async () => {
      const results = await Promise.all([
        store.getOrCreateThread(ALICE, BOB),
        store.getOrCreateThread(BOB, ALICE),
        store.getOrCreateThread(ALICE, BOB),
      ]);

      expect(new Set(results.map((t) => t.id)).size).toBe(1);
      expect(await threads.count()).toBe(1);
    });

    it('should reject a thread with yourself', async () => {
      await expect(store.getOrCreateThread(ALICE, ALICE)).rejects.toThrow('Cannot DM yourself');
    });

    it('should reject blank participants', async () => {
      await expect(store.getOrCreateThread(ALICE, '  ')).rejects.toThrow(BadRequestException);
    });
  });

  describe('getOrCreateSubjectThread', () => {
    it('should keep one thread per subject, owner and counterpart', async () => {
      const first = await store.getOrCreateSubjectThread('player-42', ALICE, BOB);
      const again = await store.getOrCreateSubjectThread('player-42', ALICE, BOB);
      const otherSubject = await store.getOrCreateSubjectThread('player-43', ALICE, BOB);
      const reversed = await store.getOrCreateSubjectThread('player-42', BOB, ALICE);

      expect(again.id).toBe(first.id);
      expect(otherSubject.id).not.toBe(first.id);
      expect(reversed.id).not.toBe(first.id);
      expect(first.kind).toBe(ThreadKind.SUBJECT);
      expect(first.subjectId).toBe('player-42');
      expect(first.participantAId).toBe(ALICE);
    });

    it('should be separate from the direct thread', async () => {
      const direct = await store.getOrCreateThread(ALICE, BOB);
      const subject = await store.getOrCreateSubjectThread('player-42', ALICE, BOB);

      expect(subject.id).not.toBe(direct.id);
    });

    it('should reject owners messaging about their own item', async () => {
      await expect(store.getOrCreateSubjectThread('player-42', ALICE, ALICE)).rejects.toThrow(
        BadRequestException,
      );
    });

    it('should reject malformed subject ids', async () => {
      await expect(store.getOrCreateSubjectThread('a:b', ALICE, BOB)).rejects.toThrow('Invalid subject ID');
    });
  });

  describe('getThreadForParticipant', () => {
    it('should throw NotFoundException for unknown threads', async () => {
      await expect(store.getThreadForParticipant('missing', ALICE)).rejects.toThrow(NotFoundException);
    });

    it('should throw ForbiddenException for outsiders', async () => {
      const thread = await store.getOrCreateThread(ALICE, BOB);

      await expect(store.getThreadForParticipant(thread.id, CAROL)).rejects.toThrow(ForbiddenException);
    });
  });

  // ==================== MESSAGES ====================

  describe('appendMessage', () => {
    let thread: ThreadEntity;

    beforeEach(async () => {
      thread = await store.getOrCreateThread(ALICE, BOB);
    });

    it('should store the trimmed body and bump the thread', async () => {
      const message = await store.appendMessage(thread.id, ALICE, '  trade for your WR?  ');

      expect(message.body).toBe('trade for your WR?');
      expect(message.senderId).toBe(ALICE);
      expect(message.readAt).toBeNull();

      const updated = await threads.findOneByOrFail({ id: thread.id });
      expect(updated.messageCount).toBe(1);
      expect(updated.lastActivityAt.getTime()).toBe(message.createdAt.getTime());
    });

    it('should reject empty and whitespace-only bodies', async () => {
      await expect(store.appendMessage(thread.id, ALICE, '')).rejects.toThrow('Message body cannot be empty');
      await expect(store.appendMessage(thread.id, ALICE, ' \n\t ')).rejects.toThrow(BadRequestException);
    });

    it('should accept 4000 characters and reject 4001', async () => {
      await expect(store.appendMessage(thread.id, ALICE, 'x'.repeat(4000))).resolves.toBeDefined();
      await expect(store.appendMessage(thread.id, ALICE, 'x'.repeat(4001))).rejects.toThrow(
        'Message body exceeds 4000 characters',
      );
    });

    it('should reject unknown threads and outsiders', async () => {
      await expect(store.appendMessage('missing', ALICE, 'hi')).rejects.toThrow(NotFoundException);
      await expect(store.appendMessage(thread.id, CAROL, 'hi')).rejects.toThrow(ForbiddenException);
    });

    it('should reject appends to archived threads', async () => {
      await store.deactivateThread(thread.id, BOB);

      await expect(store.appendMessage(thread.id, ALICE, 'hi')).rejects.toThrow('Thread is archived');
    });

    it('should keep creation times strictly increasing when the clock goes backwards', async () => {
      const first = await store.appendMessage(thread.id, ALICE, 'one');
      jest.spyOn(Date, 'now').mockReturnValue(first.createdAt.getTime() - 10_000);

      const second = await store.appendMessage(thread.id, BOB, 'two');
      const third = await store.appendMessage(thread.id, ALICE, 'three');

      expect(second.createdAt.getTime()).toBe(first.createdAt.getTime() + 1);
      expect(third.createdAt.getTime()).toBe(first.createdAt.getTime() + 2);
      const updated = await threads.findOneByOrFail({ id: thread.id });
      expect(updated.lastActivityAt.getTime()).toBe(third.createdAt.getTime());
      expect(updated.messageCount).toBe(3);
    });

    it('should retry when another append changed the thread first', async () => {
      await store.appendMessage(thread.id, ALICE, 'one');
      const current = await threads.findOneByOrFail({ id: thread.id });
      jest
        .spyOn(EntityManager.prototype, 'findOne')
        .mockResolvedValueOnce({ ...current, messageCount: current.messageCount - 1 });

      const message = await store.appendMessage(thread.id, BOB, 'two');

      expect(message.body).toBe('two');
      expect((await threads.findOneByOrFail({ id: thread.id })).messageCount).toBe(2);
      expect(await store.listMessages(thread.id, ALICE)).toHaveLength(2);
    });

    it('should give up with ConflictException after repeated contention', async () => {
      const current = await threads.findOneByOrFail({ id: thread.id });
      const findOne = jest
        .spyOn(EntityManager.prototype, 'findOne')
        .mockResolvedValue({ ...current, messageCount: current.messageCount + 7 });

      await expect(store.appendMessage(thread.id, ALICE, 'hi')).rejects.toThrow(ConflictException);
      expect(findOne).toHaveBeenCalledTimes(5);

      findOne.mockRestore();
      expect(await store.listMessages(thread.id, ALICE)).toEqual([]);
    });
  });

  describe('listMessages', () => {
    it('should return messages in creation order', async () => {
      const thread = await store.getOrCreateThread(ALICE, BOB);
      await store.appendMessage(thread.id, ALICE, 'one');
      await store.appendMessage(thread.id, BOB, 'two');
      await store.appendMessage(thread.id, ALICE, 'three');

      const messages = await store.listMessages(thread.id, BOB);
      expect(messages.map((m) => m.body)).toEqual(['one', 'two', 'three']);
    });
  });

  describe('markRead', () => {
    it("should mark only the other participant's unread messages", async () => {
      const thread = await store.getOrCreateThread(ALICE, BOB);
      await store.appendMessage(thread.id, ALICE, 'one');
      await store.appendMessage(thread.id, ALICE, 'two');
      await store.appendMessage(thread.id, BOB, 'mine');

      expect(await store.markRead(thread.id, BOB)).toBe(2);
      expect(await store.markRead(thread.id, BOB)).toBe(0);

      const messages = await store.listMessages(thread.id, BOB);
      const own = messages.find((m) => m.senderId === BOB);
      expect(own?.readAt).toBeNull();
      for (const message of messages.filter((m) => m.senderId === ALICE)) {
        expect(message.readAt).not.toBeNull();
        expect(message.readAt?.getTime()).toBeGreaterThanOrEqual(message.createdAt.getTime());
      }
    });

    it('should never stamp readAt before the newest message', async () => {
      const thread = await store.getOrCreateThread(ALICE, BOB);
      const message = await store.appendMessage(thread.id, ALICE, 'hi');
      jest.spyOn(Date, 'now').mockReturnValue(message.createdAt.getTime() - 60_000);

      await store.markRead(thread.id, BOB);

      const [stored] = await store.listMessages(thread.id, BOB);
      expect(stored.readAt?.getTime()).toBe(message.createdAt.getTime());
    });

    it('should reject outsiders', async () => {
      const thread = await store.getOrCreateThread(ALICE, BOB);

      await expect(store.markRead(thread.id, CAROL)).rejects.toThrow(ForbiddenException);
    });
  });

  describe('listThreadsFor', () => {
    it('should order threads by last activity with latest message and unread count', async () => {
      const withBob = await store.getOrCreateThread(ALICE, BOB);
      const withCarol = await store.getOrCreateThread(ALICE, CAROL);
      await store.getOrCreateThread(BOB, CAROL);

      await store.appendMessage(withCarol.id, CAROL, 'older');
      await delay(5);
      await store.appendMessage(withBob.id, BOB, 'first');
      await store.appendMessage(withBob.id, BOB, 'second');
      await store.appendMessage(withBob.id, ALICE, 'reply');

      const overview = await store.listThreadsFor(ALICE);

      expect(overview.map((o) => o.thread.id)).toEqual([withBob.id, withCarol.id]);
      expect(overview[0].latestMessage?.body).toBe('reply');
      expect(overview[0].unreadCount).toBe(2);
      expect(overview[1].latestMessage?.body).toBe('older');
      expect(overview[1].unreadCount).toBe(1);
    });

    it('should report threads without messages', async () => {
      await store.getOrCreateThread(ALICE, BOB);

      const [only] = await store.listThreadsFor(BOB);
      expect(only.latestMessage).toBeNull();
      expect(only.unreadCount).toBe(0);
    });

    it('should return an empty list for users without threads', async () => {
      await expect(store.listThreadsFor(CAROL)).resolves.toEqual([]);
    });
  });

  describe('countUnreadFor', () => {
    it('should count unread incoming messages across threads', async () => {
      const withBob = await store.getOrCreateThread(ALICE, BOB);
      const withCarol = await store.getOrCreateSubjectThread('player-7', CAROL, ALICE);
      await store.appendMessage(withBob.id, BOB, 'one');
      await store.appendMessage(withCarol.id, CAROL, 'two');
      await store.appendMessage(withCarol.id, ALICE, 'own');

      expect(await store.countUnreadFor(ALICE)).toBe(2);
      expect(await store.countUnreadFor(CAROL)).toBe(1);

      await store.markRead(withCarol.id, ALICE);
      expect(await store.countUnreadFor(ALICE)).toBe(1);
    });

    it('should only count messages at or before the cutoff', async () => {
      const thread = await store.getOrCreateThread(ALICE, BOB);
      const early = await store.appendMessage(thread.id, BOB, 'early');
      await delay(5);
      await store.appendMessage(thread.id, BOB, 'late');

      expect(await store.countUnreadFor(ALICE, { olderThan: early.createdAt })).toBe(1);
      expect(await store.countUnreadFor(ALICE, { olderThan: new Date(early.createdAt.getTime() - 1) })).toBe(0);
    });
  });

  describe('deactivateThread', () => {
    it('should archive the thread but keep its messages', async () => {
      const thread = await store.getOrCreateThread(ALICE, BOB);
      await store.appendMessage(thread.id, ALICE, 'bye');

      const archived = await store.deactivateThread(thread.id, ALICE);

      expect(archived.isActive).toBe(false);
      expect((await threads.findOneByOrFail({ id: thread.id })).isActive).toBe(false);
      expect(await store.listMessages(thread.id, BOB)).toHaveLength(1);
    });

    it('should start a new thread for the pair once the old one is archived', async () => {
      const old = await store.getOrCreateThread(ALICE, BOB);
      await store.deactivateThread(old.id, BOB);

      const fresh = await store.getOrCreateThread(BOB, ALICE);
      const message = await store.appendMessage(fresh.id, BOB, 'back again');

      expect(fresh.id).not.toBe(old.id);
      expect(fresh.isActive).toBe(true);
      expect(fresh.participantKey).toBe(old.participantKey);
      expect(message.threadId).toBe(fresh.id);
      expect((await store.getOrCreateThread(ALICE, BOB)).id).toBe(fresh.id);
      expect(await threads.countBy({ participantKey: old.participantKey })).toBe(2);
    });

    it('should start a new subject thread once the old one is archived', async () => {
      const old = await store.getOrCreateSubjectThread('player-7', ALICE, BOB);
      await store.deactivateThread(old.id, ALICE);

      const fresh = await store.getOrCreateSubjectThread('player-7', ALICE, BOB);

      expect(fresh.id).not.toBe(old.id);
      expect(fresh.isActive).toBe(true);
    });
  });
});
