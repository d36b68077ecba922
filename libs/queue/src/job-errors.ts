import { JobErrorKind } from '@hairline/database';

/**
 * Job error taxonomy.
 *
 * Handlers throw one of these to tell the runner how to settle a failed
 * attempt. Only UpstreamError is retried; the rest fail the job at once.
 * Anything else a handler throws is treated as InternalJobError.
 */
export abstract class JobError extends Error {
  abstract readonly kind: JobErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** LLM or object-storage call failed, or the model output was unusable. */
export class UpstreamError extends JobError {
  readonly kind = JobErrorKind.UPSTREAM;
  readonly retryable = true;
}

/** The job's input cannot be processed as-is. */
export class JobValidationError extends JobError {
  readonly kind = JobErrorKind.VALIDATION;
  readonly retryable = false;
}

/** A row the job depends on is gone. */
export class JobNotFoundError extends JobError {
  readonly kind = JobErrorKind.NOT_FOUND;
  readonly retryable = false;

  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`);
  }
}

export class InternalJobError extends JobError {
  readonly kind = JobErrorKind.INTERNAL;
  readonly retryable = false;
}

/** Normalises anything thrown by a handler into a JobError. */
export function toJobError(error: unknown): JobError {
  if (error instanceof JobError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new InternalJobError(cause.message, { cause });
}
