import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { validate } from './config/env.validation';
import { ENTITIES } from './entities';
import { HealthModule } from './health/health.module';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { GatewayModule } from './gateway/gateway.module';
import { MessagesModule } from './messages/messages.module';
import { DeliveryModule } from './delivery/delivery.module';
import { FanoutModule } from './fanout/fanout.module';
import { NotificationsModule } from './notifications/notifications.module';
import { RemindersModule } from './reminders/reminders.module';
import { RedisModule } from './redis/redis.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),

    // Event Emitter (message.created -> fanout)
    EventEmitterModule.forRoot(),

    // Redis (global, optional)
    RedisModule,

    // Database - Supports both individual params and DATABASE_URL (production)
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const databaseUrl = configService.get<string>('DATABASE_URL');
        const isProduction = configService.get<string>('NODE_ENV') === 'production';
        const isDevelopment = configService.get<string>('NODE_ENV') === 'development';

        const baseConfig = {
          type: 'postgres' as const,
          entities: ENTITIES,
          // NEVER use synchronize in production - use migrations
          synchronize: isDevelopment && !databaseUrl,
          logging: isDevelopment ? ['error' as const, 'warn' as const, 'migration' as const] : ['error' as const],
          extra: {
            ssl: databaseUrl ? { rejectUnauthorized: false } : false,
            max: configService.get<number>('DATABASE_POOL_MAX', 10),
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 10000,
          },
          retryAttempts: isProduction ? 10 : 3,
          retryDelay: 3000,
        };

        if (databaseUrl) {
          return {
            ...baseConfig,
            url: databaseUrl,
          };
        }

        // Otherwise use individual connection params (local dev)
        return {
          ...baseConfig,
          host: configService.get<string>('DATABASE_HOST', 'localhost'),
          port: configService.get<number>('DATABASE_PORT', 5432),
          username: configService.get<string>('DATABASE_USER', 'courtside'),
          password: configService.get<string>('DATABASE_PASSWORD', 'courtside_dev_password'),
          database: configService.get<string>('DATABASE_NAME', 'courtside'),
        };
      },
    }),

    // Feature modules
    HealthModule,
    AuthModule,
    UsersModule,
    MessagesModule,
    DeliveryModule,
    FanoutModule,
    GatewayModule,
    NotificationsModule,
    RemindersModule,
  ],
})
export class AppModule {}
