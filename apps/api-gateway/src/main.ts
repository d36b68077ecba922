import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ValidationPipe, Logger } from '@nestjs/common';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);

  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // ── CORS ──────────────────────────────────────────────
  const corsOrigin = configService.get<string>(
    'API_GATEWAY_CORS_ORIGIN',
    'http://localhost:5173',
  );
  app.enableCors({
    origin: corsOrigin.split(',').map((origin) => origin.trim()),
    credentials: true,
  });

  // Closes the Redis and Postgres connections on SIGTERM
  app.enableShutdownHooks();

  // ── Start ─────────────────────────────────────────────
  const port = Number(configService.get<number>('API_GATEWAY_PORT', 4000));
  await app.listen(port);

  logger.log(`🚀 API Gateway running on http://localhost:${port}`);
  logger.log(`💓 Health check: http://localhost:${port}/health`);
}

bootstrap().catch((error: unknown) => {
  const cause = error instanceof Error ? error : new Error(String(error));
  new Logger('Bootstrap').error(`API Gateway failed to start: ${cause.message}`, cause.stack);
  process.exit(1);
});
