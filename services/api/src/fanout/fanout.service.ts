import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import { randomUUID } from 'crypto';
import { FANOUT, LiveEvent, safeJsonParse } from '@courtside/shared';
import { LocalDispatcher } from '../delivery/local-dispatcher.service';
import { RedisService } from '../redis/redis.service';
import { MESSAGE_CREATED, MessageCreatedPayload } from '../messages/message-events';
import { FanoutEnvelope, isFanoutEnvelope } from './fanout-envelope';

/**
 * Bridges live events between API processes.
 *
 * Local connections are served directly; with Redis configured the event is
 * also published so every other process can serve its own connections.
 * Without Redis, delivery is local-only.
 */
@Injectable()
export class FanoutService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(FanoutService.name);

  /** Stamped on published envelopes so this process can skip its own */
  readonly instanceId = randomUUID();

  private readonly channel: string;
  private subscription: Promise<void> = Promise.resolve();
  private stopped = false;
  private cancelRetry: (() => void) | null = null;

  constructor(
    private readonly dispatcher: LocalDispatcher,
    private readonly redisService: RedisService,
    configService: ConfigService
  ) {
    this.channel = configService.get<string>('FANOUT_CHANNEL') || FANOUT.CHANNEL;
  }

  /**
   * Starts subscribing in the background. Bootstrap does not wait for Redis.
   */
  async onModuleInit(): Promise<void> {
    if (!this.redisService.isEnabled()) {
      this.logger.warn('Redis not configured - live events reach this process only');
      return;
    }
    this.subscription = this.subscribeUntilReady();
  }

  onModuleDestroy(): void {
    this.stopped = true;
    this.cancelRetry?.();
  }

  /**
   * Resolves once the subscriber is listening, or when shutdown ends the retries
   */
  whenSubscribed(): Promise<void> {
    return this.subscription;
  }

  @OnEvent(MESSAGE_CREATED, { async: true })
  async handleMessageCreated(payload: MessageCreatedPayload): Promise<void> {
    await this.publish(payload.recipientId, payload.event);
  }

  /**
   * Delivers locally, then broadcasts to the other processes. Never throws.
   */
  async publish(targetUserId: string, event: LiveEvent): Promise<void> {
    this.dispatcher.deliverToUser(targetUserId, event);

    if (!this.redisService.isEnabled()) {
      return;
    }

    const envelope: FanoutEnvelope = { origin: this.instanceId, targetUserId, event };
    try {
      await this.redisService.publish(this.channel, JSON.stringify(envelope));
    } catch (error) {
      this.logger.warn(`Fanout publish failed for ${targetUserId}: ${errorMessage(error)}`);
    }
  }

  /**
   * Handles one raw message from the broadcast channel
   */
  handleRemote(raw: string): void {
    const envelope = safeJsonParse(raw);
    if (!isFanoutEnvelope(envelope)) {
      this.logger.warn('Dropped malformed fanout envelope');
      return;
    }
    // Already delivered locally before publishing
    if (envelope.origin === this.instanceId) {
      return;
    }
    this.dispatcher.deliverToUser(envelope.targetUserId, envelope.event);
  }

  private async subscribeUntilReady(): Promise<void> {
    for (let attempt = 1; !this.stopped; attempt++) {
      try {
        await this.redisService.subscribe(this.channel, (raw) => this.handleRemote(raw));
        this.logger.log(`Fanout ${this.instanceId} listening on ${this.channel}`);
        return;
      } catch (error) {
        const retryIn = Math.min(FANOUT.SUBSCRIBE_RETRY_BASE_MS * 2 ** (attempt - 1), FANOUT.SUBSCRIBE_RETRY_MAX_MS);
        this.logger.warn(
          `Fanout subscribe failed (attempt ${attempt}), retrying in ${retryIn}ms: ${errorMessage(error)}`
        );
        await this.wait(retryIn);
      }
    }
  }

  private wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.cancelRetry = null;
        resolve();
      }, ms);
      this.cancelRetry = () => {
        clearTimeout(timer);
        this.cancelRetry = null;
        resolve();
      };
    });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
