import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { JobQueueProducer } from './job-queue.producer';

/** Reports whether the queue's Redis instance answers a PING. */
@Injectable()
export class QueueHealthIndicator extends HealthIndicator {
  constructor(private readonly producer: JobQueueProducer) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    try {
      await this.producer.ping();
      return this.getStatus(key, true);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new HealthCheckError(
        'Redis check failed',
        this.getStatus(key, false, { message: cause.message }),
      );
    }
  }
}
