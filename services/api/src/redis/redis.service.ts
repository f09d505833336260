/**
 * Redis Service - Wrapper around the optional Redis client for pub/sub
 */
import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import { RedisClientType } from 'redis';
import { REDIS_CLIENT } from './redis.constants';

export type ChannelListener = (message: string) => void;

/**
 * RedisService exposes publish/subscribe over the shared Redis client.
 * When no client is configured, `isEnabled()` is false and publish/subscribe
 * must not be called.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);

  /** Subscriptions need a dedicated connection in RESP2 */
  private subscriber: RedisClientType | null = null;

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: RedisClientType | null
  ) {}

  /**
   * Whether a shared broadcast channel is configured
   */
  isEnabled(): boolean {
    return this.client !== null;
  }

  /**
   * Check if Redis is connected
   */
  isConnected(): boolean {
    return this.client?.isReady ?? false;
  }

  /**
   * Publish a message on a channel, returning the number of receivers.
   * Fails fast while the client is reconnecting instead of queueing.
   */
  async publish(channel: string, message: string): Promise<number> {
    const client = this.requireClient();
    if (!client.isReady) {
      throw new Error('Redis is not connected');
    }
    try {
      return await client.publish(channel, message);
    } catch (error) {
      this.logger.error(`Redis PUBLISH error for channel ${channel}:`, error);
      throw error;
    }
  }

  /**
   * Subscribe to a channel on a duplicated connection.
   * The duplicate shares the client's reconnect strategy and resubscribes
   * after reconnecting; the listener stays attached until the module is destroyed.
   */
  async subscribe(channel: string, listener: ChannelListener): Promise<void> {
    const client = this.requireClient();
    if (!this.subscriber) {
      const subscriber = client.duplicate();
      subscriber.on('error', (err) => {
        this.logger.error('Redis Subscriber Error:', err);
      });
      this.subscriber = subscriber;
    }
    if (!this.subscriber.isOpen) {
      await this.subscriber.connect();
    }
    await this.subscriber.subscribe(channel, (message: string) => listener(message));
    this.logger.log(`Subscribed to ${channel}`);
  }

  async onModuleDestroy(): Promise<void> {
    const subscriber = this.subscriber;
    this.subscriber = null;
    await closeClient(subscriber);
    await closeClient(this.client);
  }

  private requireClient(): RedisClientType {
    if (!this.client) {
      throw new Error('Redis is not configured');
    }
    return this.client;
  }
}

/** QUIT when connected; a client still reconnecting is disconnected outright */
async function closeClient(client: RedisClientType | null): Promise<void> {
  if (!client?.isOpen) return;
  if (client.isReady) {
    await client.quit();
  } else {
    await client.disconnect();
  }
}
