import { Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { REMINDER } from '@courtside/shared';
import { ReminderAggregator, ReminderRunSummary } from './reminder-aggregator.service';

/**
 * Runs the reminder aggregator on a fixed interval.
 * A tick is skipped while the previous run is still in flight.
 */
@Injectable()
export class ReminderScheduler implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(ReminderScheduler.name);

  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<ReminderRunSummary> | null = null;

  constructor(
    private readonly aggregator: ReminderAggregator,
    private readonly configService: ConfigService
  ) {}

  onApplicationBootstrap(): void {
    if (String(this.configService.get('REMINDERS_ENABLED', 'true')) === 'false') {
      this.logger.log('Unread reminders disabled');
      return;
    }
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    this.stop();
    if (this.inFlight) {
      await this.inFlight.catch(() => undefined);
    }
  }

  start(): void {
    if (this.timer) {
      return;
    }
    const intervalMinutes = Number(
      this.configService.get<number>('REMINDER_INTERVAL_MINUTES', REMINDER.DEFAULT_INTERVAL_MIN)
    );
    this.timer = setInterval(() => void this.tick(), intervalMinutes * 60_000);
    // Don't keep the process alive just for reminders
    this.timer.unref();
    this.logger.log(`Unread reminders every ${intervalMinutes} min`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.log('Unread reminders stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Runs one pass unless one is already running. Never rejects.
   */
  async tick(): Promise<ReminderRunSummary | null> {
    if (this.inFlight) {
      this.logger.debug('Previous reminder run still in flight, skipping tick');
      return null;
    }
    this.inFlight = this.aggregator.runOnce(new Date());
    try {
      return await this.inFlight;
    } catch (error) {
      this.logger.error('Reminder run failed', error instanceof Error ? error.stack : error);
      return null;
    } finally {
      this.inFlight = null;
    }
  }
}
