import { Entity, PrimaryColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { ThreadEntity } from './thread.entity';

/**
 * A message in a thread. Immutable apart from readAt.
 */
@Entity('messages')
@Index(['threadId', 'createdAt'])
@Index(['threadId', 'senderId', 'readAt'])
export class MessageEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 36 })
  threadId!: string;

  @ManyToOne(() => ThreadEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'threadId' })
  thread?: ThreadEntity;

  @Column({ type: 'varchar', length: 36 })
  senderId!: string;

  @Column({ type: 'text' })
  body!: string;

  /** Strictly increasing within a thread */
  @Column({ type: Date })
  createdAt!: Date;

  /** Set once by a non-sender; never earlier than createdAt */
  @Column({ type: Date, nullable: true })
  readAt!: Date | null;
}
