import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import Redis from 'ioredis';
import { Job } from '@hairline/database';
import {
  DEFAULT_JOB_QUEUE_KEY,
  JOB_QUEUE_KEY,
  QUEUE_CONSUMER_CLIENT,
  QUEUE_PRODUCER_CLIENT,
} from './queue.constants';
import { JobQueueProducer } from './job-queue.producer';
import { JobQueueConsumer } from './job-queue.consumer';
import { JobSubmitter } from './job-submitter.service';

export interface QueueModuleOptions {
  /** Also open the blocking consumer connection (worker only). */
  consume?: boolean;
  /** Register once in the root module and share it with feature modules. */
  isGlobal?: boolean;
}

function createRedisClient(
  configService: ConfigService,
  maxRetriesPerRequest: number | null,
): Redis {
  return new Redis({
    host: configService.get<string>('REDIS_HOST', 'localhost'),
    port: Number(configService.get<number>('REDIS_PORT', 6379)),
    // Retry strategy: exponential back-off capped at 10 s
    retryStrategy: (times: number) => Math.min(times * 100, 10_000),
    enableReadyCheck: true,
    maxRetriesPerRequest,
    lazyConnect: false,
  });
}

/**
 * QueueModule: Redis list broker plus job submission.
 *
 * Usage:
 *   QueueModule.forRoot({ isGlobal: true })                 gateway: submit jobs
 *   QueueModule.forRoot({ isGlobal: true, consume: true })  worker: submit and consume
 *
 * Exports:
 *   - JobSubmitter:      createJob / dispatch / submit
 *   - JobQueueProducer:  enqueue(jobId), ping()
 *   - JobQueueConsumer:  next(timeout), only with `consume`
 */
@Module({})
export class QueueModule {
  static forRoot(options: QueueModuleOptions = {}): DynamicModule {
    const queueKeyProvider: Provider = {
      provide: JOB_QUEUE_KEY,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): string =>
        configService.get<string>('JOB_QUEUE_KEY', DEFAULT_JOB_QUEUE_KEY),
    };

    const producerProvider: Provider = {
      provide: QUEUE_PRODUCER_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis =>
        createRedisClient(configService, 3),
    };

    const providers: Provider[] = [
      queueKeyProvider,
      producerProvider,
      JobQueueProducer,
      JobSubmitter,
    ];
    const exports: Array<string | Function> = [JobQueueProducer, JobSubmitter];

    if (options.consume) {
      providers.push(
        {
          provide: QUEUE_CONSUMER_CLIENT,
          inject: [ConfigService],
          // Blocking pops outlive any per-request retry limit
          useFactory: (configService: ConfigService): Redis =>
            createRedisClient(configService, null),
        },
        JobQueueConsumer,
      );
      exports.push(JobQueueConsumer);
    }

    return {
      module: QueueModule,
      imports: [ConfigModule, TypeOrmModule.forFeature([Job])],
      providers,
      exports,
      global: options.isGlobal ?? false,
    };
  }
}
