import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, IsNull, Not, Repository } from 'typeorm';
import { REMINDER, UserSettingsDto, isAllowedReminderDelay } from '@courtside/shared';
import { UserEntity } from './user.entity';

export interface SettingsUpdate {
  email?: string;
  unreadReminderEnabled?: boolean;
  unreadReminderDelayMin?: number;
}

@Injectable()
export class UsersService {
  constructor(
    @InjectRepository(UserEntity)
    private readonly userRepository: Repository<UserEntity>
  ) {}

  async findById(id: string): Promise<UserEntity | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  async findByIdOrFail(id: string): Promise<UserEntity> {
    const user = await this.findById(id);
    if (!user) {
      throw new NotFoundException('User not found');
    }
    return user;
  }

  async findByIds(ids: string[]): Promise<UserEntity[]> {
    if (ids.length === 0) return [];
    return this.userRepository.find({ where: { id: In(ids) } });
  }

  async findByUsername(username: string): Promise<UserEntity | null> {
    return this.userRepository.findOne({ where: { username } });
  }

  /**
   * Users who opted into unread reminders and have a verified address
   */
  async findReminderCandidates(): Promise<UserEntity[]> {
    return this.userRepository.find({
      where: {
        unreadReminderEnabled: true,
        emailVerified: true,
        email: Not(IsNull()),
      },
    });
  }

  /**
   * Applies a settings change. A new or cleared email address resets verification.
   */
  async updateSettings(userId: string, update: SettingsUpdate): Promise<UserEntity> {
    const user = await this.findByIdOrFail(userId);

    if (update.email !== undefined) {
      const email = update.email.trim().toLowerCase() || null;
      if (email !== user.email) {
        user.email = email;
        user.emailVerified = false;
      }
    }

    if (update.unreadReminderEnabled !== undefined) {
      user.unreadReminderEnabled = update.unreadReminderEnabled;
    }

    if (update.unreadReminderDelayMin !== undefined) {
      if (!isAllowedReminderDelay(update.unreadReminderDelayMin)) {
        throw new BadRequestException('unreadReminderDelayMin must be one of 30, 60, 180');
      }
      user.unreadReminderDelayMin = update.unreadReminderDelayMin;
    }

    return this.userRepository.save(user);
  }

  /**
   * Takes the right to remind a user, for one lease. Fails when another
   * runner holds an unexpired claim or the user was reminded within the cooldown.
   */
  async claimReminder(userId: string, now: Date): Promise<boolean> {
    const result = await this.userRepository
      .createQueryBuilder()
      .update(UserEntity)
      .set({ reminderClaimedUntil: new Date(now.getTime() + REMINDER.CLAIM_LEASE_MS) })
      .where('"id" = :userId', { userId })
      .andWhere('("reminderClaimedUntil" IS NULL OR "reminderClaimedUntil" <= :now)', {
        now: this.toStoredTimestamp('reminderClaimedUntil', now),
      })
      .andWhere('("lastUnreadReminderSentAt" IS NULL OR "lastUnreadReminderSentAt" <= :cooldownStart)', {
        cooldownStart: this.toStoredTimestamp(
          'lastUnreadReminderSentAt',
          new Date(now.getTime() - REMINDER.COOLDOWN_MS)
        ),
      })
      .execute();
    return result.affected === 1;
  }

  async releaseReminderClaim(userId: string): Promise<void> {
    await this.userRepository.update(userId, { reminderClaimedUntil: null });
  }

  async markReminderSent(userId: string, sentAt: Date): Promise<void> {
    await this.userRepository.update(userId, { lastUnreadReminderSentAt: sentAt, reminderClaimedUntil: null });
  }

  /**
   * Marks the address verified only if it is still the one the token was issued for
   */
  async markEmailVerified(userId: string, email: string): Promise<void> {
    const user = await this.findByIdOrFail(userId);
    if (user.email !== email) {
      throw new BadRequestException('Email does not match current user email');
    }
    if (!user.emailVerified) {
      user.emailVerified = true;
      await this.userRepository.save(user);
    }
  }

  toSettingsDto(user: UserEntity): UserSettingsDto {
    return {
      id: user.id,
      username: user.username,
      displayName: user.displayName,
      email: user.email,
      emailVerified: user.emailVerified,
      unreadReminderEnabled: user.unreadReminderEnabled,
      unreadReminderDelayMin: user.unreadReminderDelayMin,
    };
  }

  /** Binds a Date in the storage format of the given column */
  private toStoredTimestamp(property: 'reminderClaimedUntil' | 'lastUnreadReminderSentAt', date: Date): unknown {
    const column = this.userRepository.metadata.findColumnWithPropertyName(property);
    return column ? this.userRepository.manager.connection.driver.preparePersistentValue(date, column) : date;
  }
}
