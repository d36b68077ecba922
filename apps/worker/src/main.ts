import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  // HTTP only serves health checks; jobs arrive over the Redis queue
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  // Stops the consume loop before the Redis connections close
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const httpPort = Number(configService.get<number>('WORKER_HTTP_PORT', 4001));
  await app.listen(httpPort);

  logger.log('🔧 Worker consuming jobs');
  logger.log(`💓 Worker health check on http://localhost:${httpPort}/health`);
}

bootstrap().catch((error: unknown) => {
  const cause = error instanceof Error ? error : new Error(String(error));
  new Logger('Bootstrap').error(`Worker failed to start: ${cause.message}`, cause.stack);
  process.exit(1);
});
