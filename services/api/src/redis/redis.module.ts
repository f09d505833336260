import { Module, Global, Logger } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { createClient, RedisClientType } from 'redis';
import { FANOUT } from '@courtside/shared';
import { REDIS_CLIENT } from './redis.constants';
import { RedisService } from './redis.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): RedisClientType | null => {
        const logger = new Logger('RedisModule');
        const url = configService.get<string>('REDIS_URL');

        // No shared channel: every process delivers to its own connections only
        if (!url) {
          logger.log('REDIS_URL not set - running in single-process mode');
          return null;
        }

        const client = createClient({
          url,
          socket: {
            // Never give up: a closed client would end cross-process delivery for good
            reconnectStrategy: (retries: number) => {
              if (retries > 0 && retries % 20 === 0) {
                logger.error(`Redis: still unreachable after ${retries} reconnection attempts`);
              }
              return Math.min(retries * 100, FANOUT.RECONNECT_MAX_MS);
            },
          },
        }) as RedisClientType;

        client.on('error', (err) => {
          logger.error('Redis Client Error:', err);
        });

        client.on('connect', () => {
          logger.log('Redis Client Connected');
        });

        client.on('reconnecting', () => {
          logger.warn('Redis Client Reconnecting...');
        });

        // Connects in the background; publishes are dropped until the client is ready
        client.connect().catch((error: unknown) => {
          logger.error('Redis connection abandoned', error instanceof Error ? error.stack : String(error));
        });
        return client;
      },
    },
    RedisService,
  ],
  exports: [REDIS_CLIENT, RedisService],
})
export class RedisModule {}
