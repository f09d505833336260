import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { ThreadKind } from '@courtside/shared';

/**
 * Conversation thread between two users.
 *
 * The participantKey is derived from the participants (and subject, for
 * subject threads). It is unique among active threads, so concurrent creators
 * converge on one row. Threads are never deleted, only deactivated; a pair
 * whose thread was archived gets a new one on the next start.
 */
@Entity('threads')
@Index('UQ_threads_active_participantKey', ['participantKey'], { unique: true, where: '"isActive" = true' })
export class ThreadEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 16 })
  kind!: ThreadKind;

  /**
   * DIRECT: `direct:<a>:<b>` with a < b.
   * SUBJECT: `subject:<subjectId>:<owner>:<counterpart>`.
   */
  @Column({ type: 'varchar', length: 160 })
  @Index()
  participantKey!: string;

  /** Smaller ID for DIRECT threads, the owner for SUBJECT threads */
  @Column({ type: 'varchar', length: 36 })
  @Index()
  participantAId!: string;

  @Column({ type: 'varchar', length: 36 })
  @Index()
  participantBId!: string;

  /** The discussed item, for SUBJECT threads */
  @Column({ type: 'varchar', length: 64, nullable: true })
  subjectId!: string | null;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  /** Compare-and-swap counter serializing appends */
  @Column({ type: 'integer', default: 0 })
  messageCount!: number;

  @Column({ type: Date })
  createdAt!: Date;

  /** Equals the newest message's createdAt, or createdAt when empty */
  @Column({ type: Date })
  @Index()
  lastActivityAt!: Date;
}
