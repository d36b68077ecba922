import { Injectable, Inject, Logger, OnApplicationShutdown } from '@nestjs/common';
import Redis from 'ioredis';
import { JOB_QUEUE_KEY, QUEUE_CONSUMER_CLIENT } from './queue.constants';

/**
 * JobQueueConsumer: blocking pop from the job list.
 *
 * BRPOP hands each id to exactly one waiting connection, which is the
 * whole of the at-most-one-worker guarantee.
 */
@Injectable()
export class JobQueueConsumer implements OnApplicationShutdown {
  private readonly logger = new Logger(JobQueueConsumer.name);

  constructor(
    @Inject(QUEUE_CONSUMER_CLIENT)
    private readonly client: Redis,
    @Inject(JOB_QUEUE_KEY)
    private readonly queueKey: string,
  ) {}

  /**
   * Waits up to `timeoutSeconds` for the next job id.
   * Resolves null when the wait times out.
   */
  async next(timeoutSeconds: number): Promise<string | null> {
    const reply = await this.client.brpop(this.queueKey, timeoutSeconds);
    return reply ? reply[1] : null;
  }

  /** Runs after the job runner has stopped popping. */
  onApplicationShutdown(): void {
    // QUIT would queue behind an in-flight BRPOP
    this.logger.log('Closing Redis consumer connection');
    this.client.disconnect();
  }
}
