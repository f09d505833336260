import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import helmet from 'helmet';
import { json, urlencoded } from 'express';
import { API } from '@courtside/shared';
import { originCheck, resolveCorsPolicy } from './config/cors';
import { CorsIoAdapter } from './gateway/cors-io.adapter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');
  const isProduction = configService.get<string>('NODE_ENV') === 'production';

  // JSON only: nothing here is rendered as a page
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts: isProduction ? { maxAge: 31536000, includeSubDomains: true } : false,
    referrerPolicy: { policy: 'no-referrer' },
  }));

  app.use(json({ limit: '100kb' }));
  app.use(urlencoded({ extended: true, limit: '100kb' }));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    })
  );

  // Same origin policy for HTTP and live connections
  const corsPolicy = resolveCorsPolicy(configService);
  app.enableCors({
    origin: originCheck(corsPolicy, (origin) => logger.warn(`CORS blocked request from: ${origin}`)),
    credentials: true,
    methods: ['GET', 'POST', 'PATCH'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
  app.useWebSocketAdapter(new CorsIoAdapter(app, corsPolicy));

  app.setGlobalPrefix(API.BASE_PATH);
  app.enableShutdownHooks();

  const port = configService.get<number>('PORT', API.DEFAULT_PORT);
  await app.listen(port);

  logger.log(`Courtside API running on http://localhost:${port}`);
  logger.log(`CORS origins: ${corsPolicy.origins.join(', ')}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
