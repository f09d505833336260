import { Entity, PrimaryColumn, Column, CreateDateColumn, Index, BeforeInsert } from 'typeorm';
import { randomUUID } from 'crypto';
import { REMINDER } from '@courtside/shared';

/**
 * Account row owned by the auth system. This service reads it and writes
 * only the contact and reminder columns.
 */
@Entity('users')
export class UserEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 32, unique: true })
  @Index()
  username!: string;

  @Column({ type: 'varchar', length: 100 })
  displayName!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;

  @Column({ type: 'boolean', default: false })
  emailVerified!: boolean;

  @Column({ type: 'boolean', default: false })
  unreadReminderEnabled!: boolean;

  @Column({ type: 'integer', default: REMINDER.DEFAULT_DELAY_MIN })
  unreadReminderDelayMin!: number;

  @Column({ type: Date, nullable: true })
  lastUnreadReminderSentAt!: Date | null;

  /** Lease held by the reminder runner currently emailing this user */
  @Column({ type: Date, nullable: true })
  reminderClaimedUntil!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @BeforeInsert()
  assignId(): void {
    if (!this.id) {
      this.id = randomUUID();
    }
  }
}
