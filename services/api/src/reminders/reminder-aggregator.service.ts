import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { REMINDER, withTimeout } from '@courtside/shared';
import { UsersService } from '../users/users.service';
import { UserEntity } from '../users/user.entity';
import { ConversationsService } from '../messages/conversations.service';
import { NOTIFIER, Notifier } from '../notifications/notifier';
import { buildUnreadReminderEmail } from './reminder-email';

export interface ReminderRunSummary {
  checked: number;
  sent: number;
  skipped: number;
  failed: number;
}

export type ReminderSkipReason = 'disabled' | 'unverified' | 'cooldown' | 'nothing-unread';

export type ReminderDecision =
  | { action: 'send'; to: string; unreadCount: number }
  | { action: 'skip'; reason: ReminderSkipReason };

/**
 * Emails users who left messages unread past their chosen delay.
 * At most one reminder per user per cooldown window.
 */
@Injectable()
export class ReminderAggregator {
  private readonly logger = new Logger(ReminderAggregator.name);

  private readonly sendTimeoutMs: number;
  private readonly webAppUrl: string;

  constructor(
    private readonly usersService: UsersService,
    private readonly conversations: ConversationsService,
    @Inject(NOTIFIER) private readonly notifier: Notifier,
    configService: ConfigService
  ) {
    this.sendTimeoutMs = Number(
      configService.get<number>('REMINDER_SEND_TIMEOUT_MS', REMINDER.DEFAULT_SEND_TIMEOUT_MS)
    );
    this.webAppUrl = configService.get<string>('WEB_APP_URL', 'http://localhost:4200');
  }

  /**
   * One pass over every reminder candidate. A failure for one user is
   * counted and logged; the pass continues.
   *
   * Several processes may run passes at once. Each user is re-read before
   * the decision and claimed before the send, so only one runner emails them.
   */
  async runOnce(now: Date = new Date()): Promise<ReminderRunSummary> {
    const summary: ReminderRunSummary = { checked: 0, sent: 0, skipped: 0, failed: 0 };

    if (!this.notifier.isConfigured()) {
      this.logger.warn('Notifier not configured - skipping reminder run');
      return summary;
    }

    const candidates = await this.usersService.findReminderCandidates();
    for (const candidate of candidates) {
      summary.checked++;
      try {
        const sent = await this.processUser(candidate.id, now);
        if (sent) {
          summary.sent++;
        } else {
          summary.skipped++;
        }
      } catch (error) {
        summary.failed++;
        this.logger.error(
          `Unread reminder failed for user ${candidate.id}`,
          error instanceof Error ? error.stack : error
        );
      }
    }

    this.logger.log(
      `Reminder run: ${summary.checked} checked, ${summary.sent} sent, ${summary.skipped} skipped, ${summary.failed} failed`
    );
    return summary;
  }

  async evaluate(user: UserEntity, now: Date): Promise<ReminderDecision> {
    if (!user.unreadReminderEnabled) {
      return { action: 'skip', reason: 'disabled' };
    }
    if (!user.email || !user.emailVerified) {
      return { action: 'skip', reason: 'unverified' };
    }
    if (
      user.lastUnreadReminderSentAt &&
      now.getTime() - user.lastUnreadReminderSentAt.getTime() < REMINDER.COOLDOWN_MS
    ) {
      return { action: 'skip', reason: 'cooldown' };
    }

    const olderThan = new Date(now.getTime() - user.unreadReminderDelayMin * 60_000);
    const unreadCount = await this.conversations.countUnreadFor(user.id, { olderThan });
    if (unreadCount === 0) {
      return { action: 'skip', reason: 'nothing-unread' };
    }
    return { action: 'send', to: user.email, unreadCount };
  }

  private async processUser(userId: string, now: Date): Promise<boolean> {
    const user = await this.usersService.findById(userId);
    if (!user) {
      return false;
    }
    const decision = await this.evaluate(user, now);
    if (decision.action === 'skip') {
      return false;
    }
    if (!(await this.usersService.claimReminder(user.id, now))) {
      this.logger.debug(`User ${user.id} is being reminded by another runner`);
      return false;
    }
    await this.remind(user, decision.to, decision.unreadCount, now);
    return true;
  }

  /** Sends first, then records; a failed send hands the user back for the next run */
  private async remind(user: UserEntity, to: string, unreadCount: number, now: Date): Promise<void> {
    const email = buildUnreadReminderEmail(to, user.displayName, unreadCount, this.webAppUrl);
    try {
      await withTimeout(this.notifier.send(email), this.sendTimeoutMs, 'Reminder send');
    } catch (error) {
      await this.usersService.releaseReminderClaim(user.id);
      throw error;
    }
    await this.usersService.markReminderSent(user.id, now);
    this.logger.debug(`Reminded user ${user.id} of ${unreadCount} unread`);
  }
}
