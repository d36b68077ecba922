import { Injectable, Inject, Logger, OnApplicationShutdown } from '@nestjs/common';
import Redis from 'ioredis';
import { JOB_QUEUE_KEY, QUEUE_PRODUCER_CLIENT } from './queue.constants';

/**
 * JobQueueProducer: pushes job ids onto the Redis list the workers
 * consume. The list holds ids only; payloads live in the `jobs` table.
 */
@Injectable()
export class JobQueueProducer implements OnApplicationShutdown {
  private readonly logger = new Logger(JobQueueProducer.name);

  constructor(
    @Inject(QUEUE_PRODUCER_CLIENT)
    private readonly client: Redis,
    @Inject(JOB_QUEUE_KEY)
    private readonly queueKey: string,
  ) {}

  /**
   * @returns queue depth after the push
   */
  async enqueue(jobId: string): Promise<number> {
    const depth = await this.client.lpush(this.queueKey, jobId);

    this.logger.debug(
      `Enqueued job ${jobId} on "${this.queueKey}", depth ${depth}`,
    );

    return depth;
  }

  /** Round-trips a PING; used by health checks. */
  async ping(): Promise<string> {
    return this.client.ping();
  }

  async onApplicationShutdown(): Promise<void> {
    this.logger.log('Closing Redis producer connection');
    await this.client.quit();
  }
}
