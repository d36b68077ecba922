import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Job, JobStatus, JobType } from '@hairline/database';
import { JobQueueProducer } from './job-queue.producer';
import type { JobPayloadMap } from './job-payloads';

/**
 * JobSubmitter: creates job rows and hands their ids to the queue.
 *
 * Creation and dispatch are separate steps so callers can create the job
 * inside their own transaction and dispatch only after it commits; a
 * worker must never pop an id whose row is not visible yet.
 *
 * Dispatch failures are non-fatal: the row stays PENDING and the
 * worker's recovery sweep re-enqueues it.
 */
@Injectable()
export class JobSubmitter {
  private readonly logger = new Logger(JobSubmitter.name);

  constructor(
    @InjectRepository(Job)
    private readonly jobRepository: Repository<Job>,
    private readonly producer: JobQueueProducer,
  ) {}

  /**
   * Inserts a PENDING job row.
   *
   * @param manager - transaction-scoped manager; the job commits with it
   */
  async createJob<T extends JobType>(
    type: T,
    payload: JobPayloadMap[T],
    userId: string | null,
    manager?: EntityManager,
  ): Promise<Job> {
    const repository = manager
      ? manager.getRepository(Job)
      : this.jobRepository;

    const data: Record<string, unknown> = payload;
    const job = repository.create({
      type,
      payload: data,
      userId,
      status: JobStatus.PENDING,
      result: null,
      errorKind: null,
      errorMessage: null,
      attempts: 0,
      startedAt: null,
      completedAt: null,
    });

    return repository.save(job);
  }

  /**
   * Pushes a committed job onto the queue.
   *
   * @returns false when the push failed and recovery will pick the job up
   */
  async dispatch(job: Job): Promise<boolean> {
    try {
      await this.producer.enqueue(job.id);
      this.logger.log(`Dispatched ${job.type} job ${job.id}`);
      return true;
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(
        `Failed to enqueue ${job.type} job ${job.id}: ${cause.message}. ` +
          `Job saved, dispatch deferred to recovery.`,
      );
      return false;
    }
  }

  /** createJob + dispatch, for callers with nothing else to commit. */
  async submit<T extends JobType>(
    type: T,
    payload: JobPayloadMap[T],
    userId: string | null,
  ): Promise<Job> {
    const job = await this.createJob(type, payload, userId);
    await this.dispatch(job);
    return job;
  }
}
