import { z } from 'zod';
import { Job, JobType, JsonObject } from '@hairline/database';
import { JobError, JobValidationError } from '@hairline/queue';

/** Stored on the job row as jsonb once the job completes. */
export type JobResult = JsonObject;

/** What the runner needs from a handler, independent of its payload type. */
export interface RegisteredJobHandler {
  readonly type: JobType;
  run(job: Job): Promise<JobResult>;
  fail(job: Job, error: JobError): Promise<void>;
}

/**
 * JobHandler: base class for every job type the worker executes.
 *
 * Subclasses declare the payload schema they accept and implement
 * `handle`. The payload is parsed before `handle` runs; a payload that
 * does not match fails the job as a validation error without retries.
 *
 * `onFailed` runs once, after the job row is already FAILED, so handlers
 * can move their own domain rows into a failed or retryable state.
 */
export abstract class JobHandler<P> implements RegisteredJobHandler {
  abstract readonly type: JobType;
  protected abstract readonly payloadSchema: z.ZodType<P>;

  protected abstract handle(payload: P, job: Job): Promise<JobResult>;

  protected async onFailed(
    _payload: P,
    _job: Job,
    _error: JobError,
  ): Promise<void> {
    // no domain rows to settle by default
  }

  async run(job: Job): Promise<JobResult> {
    const parsed = this.payloadSchema.safeParse(job.payload);
    if (!parsed.success) {
      throw new JobValidationError(
        `Invalid ${this.type} payload: ${z.prettifyError(parsed.error)}`,
      );
    }

    return this.handle(parsed.data, job);
  }

  async fail(job: Job, error: JobError): Promise<void> {
    const parsed = this.payloadSchema.safeParse(job.payload);
    // Nothing to clean up for a payload that never named a row
    if (!parsed.success) {
      return;
    }

    await this.onFailed(parsed.data, job, error);
  }
}
