import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { LessThan, Repository } from 'typeorm';
import { Subscription, exhaustMap, interval } from 'rxjs';
import { Job, JobStatus } from '@hairline/database';
import { InternalJobError, JobQueueProducer } from '@hairline/queue';
import { JobRunnerService } from './job-runner.service';
import {
  DEFAULT_JOB_MAX_ATTEMPTS,
  DEFAULT_JOB_RECOVERY_INTERVAL_MS,
  DEFAULT_JOB_STALE_AFTER_MS,
  RECOVERY_BATCH_SIZE,
} from './jobs.constants';

/**
 * Re-enqueues jobs that were never dispatched or whose worker died.
 *
 * A PENDING job counts as stale once it has sat unclaimed longer than
 * JOB_STALE_AFTER_MS; a STARTED one once its row has not been touched for
 * that long. Stale STARTED jobs with no attempts left are failed instead.
 */
@Injectable()
export class JobRecoveryService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(JobRecoveryService.name);
  private readonly intervalMs: number;
  private readonly staleAfterMs: number;
  private readonly maxAttempts: number;
  private subscription: Subscription | null = null;

  constructor(
    @InjectRepository(Job)
    private readonly jobRepository: Repository<Job>,
    private readonly producer: JobQueueProducer,
    private readonly runner: JobRunnerService,
    configService: ConfigService,
  ) {
    this.intervalMs = Number(
      configService.get<number>(
        'JOB_RECOVERY_INTERVAL_MS',
        DEFAULT_JOB_RECOVERY_INTERVAL_MS,
      ),
    );
    this.staleAfterMs = Number(
      configService.get<number>('JOB_STALE_AFTER_MS', DEFAULT_JOB_STALE_AFTER_MS),
    );
    this.maxAttempts = Number(
      configService.get<number>('JOB_MAX_ATTEMPTS', DEFAULT_JOB_MAX_ATTEMPTS),
    );
  }

  onApplicationBootstrap(): void {
    // exhaustMap drops ticks while a sweep is still running
    this.subscription = interval(this.intervalMs)
      .pipe(exhaustMap(() => this.sweep()))
      .subscribe();
  }

  onModuleDestroy(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  /**
   * One recovery pass.
   *
   * @returns number of jobs pushed back onto the queue
   */
  async recoverStaleJobs(now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.staleAfterMs);

    const staleJobs = await this.jobRepository.find({
      where: [
        { status: JobStatus.PENDING, updatedAt: LessThan(cutoff) },
        { status: JobStatus.STARTED, updatedAt: LessThan(cutoff) },
      ],
      order: { createdAt: 'ASC' },
      take: RECOVERY_BATCH_SIZE,
    });

    let requeued = 0;

    for (const job of staleJobs) {
      if (
        job.status === JobStatus.STARTED &&
        job.attempts >= this.maxAttempts
      ) {
        await this.runner.failJob(
          job,
          new InternalJobError('Job did not finish before its worker stopped'),
        );
        continue;
      }

      await this.producer.enqueue(job.id);
      // Touch the row so the next pass waits a full stale window again
      await this.jobRepository.update(
        { id: job.id, status: job.status },
        { updatedAt: now },
      );
      requeued++;
    }

    if (staleJobs.length > 0) {
      this.logger.log(
        `Recovery: ${requeued} job(s) re-enqueued, ` +
          `${staleJobs.length - requeued} failed`,
      );
    }

    return requeued;
  }

  private async sweep(): Promise<void> {
    try {
      await this.recoverStaleJobs();
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Recovery sweep failed: ${cause.message}`, cause.stack);
    }
  }
}
