import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { API } from '@parley/shared';
import { AppModule } from './app.module';
import { resolveCorsOrigins } from './config/cors';
import { ChatIoAdapter } from './gateway/chat-io.adapter';
import helmet from 'helmet';
import { json, urlencoded } from 'express';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');
  const isProduction = configService.get<string>('NODE_ENV') === 'production';

  // SECURITY: Helmet for HTTP security headers
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        connectSrc: ["'self'"],
        frameSrc: ["'none'"],
        objectSrc: ["'none'"],
        upgradeInsecureRequests: isProduction ? [] : null,
      },
    },
    hsts: isProduction ? { maxAge: 31536000, includeSubDomains: true } : false,
    frameguard: { action: 'deny' },
    noSniff: true,
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  }));

  // File transfers travel over the socket, so HTTP bodies stay small
  app.use(json({ limit: '100kb' }));
  app.use(urlencoded({ extended: true, limit: '100kb' }));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    })
  );

  const corsOrigins = resolveCorsOrigins(isProduction, configService.get<string>('CORS_ORIGINS', ''));
  app.useWebSocketAdapter(new ChatIoAdapter(app, corsOrigins));

  app.enableCors({
    origin: (origin, callback) => {
      // Requests without an origin (curl, scripts) only in dev
      if (!origin) {
        if (!isProduction) {
          callback(null, true);
        } else {
          callback(new Error('CORS: Origin required in production'));
        }
        return;
      }

      if (corsOrigins.includes(origin)) {
        callback(null, true);
      } else {
        logger.warn(`CORS blocked request from: ${origin}`);
        callback(new Error('Not allowed by CORS'));
      }
    },
    methods: ['GET'],
    allowedHeaders: ['Content-Type', 'X-Requested-With'],
  });

  app.setGlobalPrefix(API.BASE_PATH.replace(/^\//, ''));

  const port = Number(configService.get<string | number>('PORT', API.DEFAULT_PORT));
  await app.listen(port);

  logger.log(`Parley API running on http://localhost:${port}`);
  logger.log(`Chat socket at ws://localhost:${port}${API.WS_NAMESPACE}`);
  if (!isProduction) {
    logger.log(`CORS origins: ${corsOrigins.join(', ')}`);
  }
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
