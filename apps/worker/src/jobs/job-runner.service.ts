import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import {
  Job,
  JobStatus,
  JobType,
  TERMINAL_JOB_STATUSES,
} from '@hairline/database';
import {
  InternalJobError,
  JobError,
  JobQueueConsumer,
  JobQueueProducer,
  toJobError,
} from '@hairline/queue';
import { JobResult, RegisteredJobHandler } from './job-handler';
import {
  CONSUMER_ERROR_BACKOFF_MS,
  DEFAULT_JOB_MAX_ATTEMPTS,
  DEFAULT_JOB_POP_TIMEOUT_SECONDS,
  JOB_HANDLERS,
} from './jobs.constants';

/**
 * JobRunnerService: pops job ids and drives each job to a terminal state.
 *
 * Lifecycle per id:
 *   1. load: unknown ids and terminal jobs are skipped
 *   2. claim: conditional UPDATE on (status, attempts); a lost race skips
 *   3. run: handler parses the payload and does the work
 *   4. settle: COMPLETED with result, re-enqueue for a retryable error
 *      with attempts left, FAILED otherwise (+ onFailed hook)
 *
 * Transitions:
 *   PENDING ──→ STARTED ──→ COMPLETED
 *                  │ ↺ retry
 *                  └──────→ FAILED
 *
 * Every write after the claim is conditioned on `status = STARTED`, so a
 * terminal row is never rewritten.
 */
@Injectable()
export class JobRunnerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(JobRunnerService.name);
  private readonly handlers = new Map<JobType, RegisteredJobHandler>();
  private readonly maxAttempts: number;
  private readonly popTimeoutSeconds: number;

  private running = false;
  private loop: Promise<void> | null = null;

  constructor(
    @InjectRepository(Job)
    private readonly jobRepository: Repository<Job>,
    private readonly consumer: JobQueueConsumer,
    private readonly producer: JobQueueProducer,
    @Inject(JOB_HANDLERS)
    handlers: RegisteredJobHandler[],
    configService: ConfigService,
  ) {
    for (const handler of handlers) {
      if (this.handlers.has(handler.type)) {
        throw new Error(`Duplicate job handler for type "${handler.type}"`);
      }
      this.handlers.set(handler.type, handler);
    }

    this.maxAttempts = Number(
      configService.get<number>('JOB_MAX_ATTEMPTS', DEFAULT_JOB_MAX_ATTEMPTS),
    );
    this.popTimeoutSeconds = Number(
      configService.get<number>(
        'JOB_POP_TIMEOUT_SECONDS',
        DEFAULT_JOB_POP_TIMEOUT_SECONDS,
      ),
    );
  }

  // ── Lifecycle ────────────────────────────────────────────

  onApplicationBootstrap(): void {
    this.running = true;
    this.loop = this.consume().catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Job consumer loop stopped: ${message}`);
    });

    this.logger.log(
      `Consuming jobs for ${this.handlers.size} type(s), ` +
        `max ${this.maxAttempts} attempt(s) each`,
    );
  }

  /** Stops popping and waits for the job in hand to settle. */
  async onModuleDestroy(): Promise<void> {
    this.running = false;
    await this.loop;
    this.logger.log('Job consumer stopped');
  }

  // ── Processing ───────────────────────────────────────────

  async processJob(jobId: string): Promise<void> {
    const job = await this.jobRepository.findOne({ where: { id: jobId } });

    if (!job) {
      this.logger.warn(`Popped unknown job id ${jobId}, skipping`);
      return;
    }

    if (TERMINAL_JOB_STATUSES.includes(job.status)) {
      this.logger.debug(`Job ${job.id} is already ${job.status}, skipping`);
      return;
    }

    if (!(await this.claim(job))) {
      this.logger.debug(`Job ${job.id} was claimed elsewhere, skipping`);
      return;
    }

    const handler = this.handlers.get(job.type);
    if (!handler) {
      await this.failJob(
        job,
        new InternalJobError(`No handler registered for job type "${job.type}"`),
      );
      return;
    }

    let result: JobResult;
    try {
      result = await handler.run(job);
    } catch (error) {
      await this.settleFailure(job, toJobError(error));
      return;
    }

    const outcome = await this.jobRepository.update(
      { id: job.id, status: JobStatus.STARTED },
      { status: JobStatus.COMPLETED, result, completedAt: new Date() },
    );

    if (!outcome.affected) {
      this.logger.warn(
        `Job ${job.id} finished but was no longer STARTED; result dropped`,
      );
      return;
    }

    this.logger.log(
      `Job ${job.id} (${job.type}) completed on attempt ${job.attempts}`,
    );
  }

  /**
   * Moves a STARTED job to FAILED and runs its handler's onFailed hook.
   * Also used by the recovery sweep for jobs whose worker died.
   */
  async failJob(job: Job, error: JobError): Promise<void> {
    const outcome = await this.jobRepository.update(
      { id: job.id, status: JobStatus.STARTED },
      {
        status: JobStatus.FAILED,
        errorKind: error.kind,
        errorMessage: error.message,
        completedAt: new Date(),
      },
    );

    if (!outcome.affected) {
      this.logger.warn(`Job ${job.id} was no longer STARTED; failure dropped`);
      return;
    }

    this.logger.error(
      `Job ${job.id} (${job.type}) failed [${error.kind}] after ` +
        `${job.attempts} attempt(s): ${error.message}`,
    );

    const handler = this.handlers.get(job.type);
    if (!handler) {
      return;
    }

    try {
      await handler.fail(job, error);
    } catch (hookError) {
      const cause =
        hookError instanceof Error ? hookError : new Error(String(hookError));
      this.logger.error(
        `onFailed hook for job ${job.id} (${job.type}) threw: ${cause.message}`,
        cause.stack,
      );
    }
  }

  // ── Private helpers ──────────────────────────────────────

  private async consume(): Promise<void> {
    while (this.running) {
      let jobId: string | null;

      try {
        jobId = await this.consumer.next(this.popTimeoutSeconds);
      } catch (error) {
        if (!this.running) {
          break;
        }
        const cause = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(`Job pop failed: ${cause.message}`);
        await this.sleep(CONSUMER_ERROR_BACKOFF_MS);
        continue;
      }

      if (!jobId) {
        continue;
      }

      try {
        await this.processJob(jobId);
      } catch (error) {
        // Row stays STARTED or PENDING; the recovery sweep retries it
        const cause = error instanceof Error ? error : new Error(String(error));
        this.logger.error(
          `Could not process job ${jobId}: ${cause.message}`,
          cause.stack,
        );
      }
    }
  }

  /**
   * Fenced on the attempt count read at load time: of two workers that
   * loaded the same snapshot only one UPDATE matches.
   */
  private async claim(job: Job): Promise<boolean> {
    const attempts = job.attempts + 1;
    const startedAt = job.startedAt ?? new Date();

    const outcome = await this.jobRepository.update(
      {
        id: job.id,
        status: In([JobStatus.PENDING, JobStatus.STARTED]),
        attempts: job.attempts,
      },
      { status: JobStatus.STARTED, attempts, startedAt },
    );

    if (!outcome.affected) {
      return false;
    }

    job.status = JobStatus.STARTED;
    job.attempts = attempts;
    job.startedAt = startedAt;
    return true;
  }

  private async settleFailure(job: Job, error: JobError): Promise<void> {
    if (!error.retryable || job.attempts >= this.maxAttempts) {
      await this.failJob(job, error);
      return;
    }

    this.logger.warn(
      `Job ${job.id} (${job.type}) attempt ${job.attempts}/${this.maxAttempts} ` +
        `failed [${error.kind}]: ${error.message}. Retrying`,
    );

    try {
      await this.producer.enqueue(job.id);
    } catch (enqueueError) {
      const cause =
        enqueueError instanceof Error
          ? enqueueError
          : new Error(String(enqueueError));
      this.logger.error(
        `Failed to re-enqueue job ${job.id}: ${cause.message}. ` +
          `Left STARTED for the recovery sweep`,
      );
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
