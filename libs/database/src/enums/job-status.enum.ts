/**
 * Lifecycle of a background job.
 *
 * Transitions:
 *   PENDING → STARTED → COMPLETED
 *                     → FAILED
 *
 * STARTED may be re-entered by a retry of the same job. Nothing ever
 * leaves COMPLETED or FAILED.
 */
export enum JobStatus {
  /** Row created, id pushed (or about to be pushed) onto the queue */
  PENDING = 'pending',

  /** A worker claimed the job and is running its handler */
  STARTED = 'started',

  /** Handler finished; `result` holds its output */
  COMPLETED = 'completed',

  /** Retry budget exhausted or terminal error; see errorKind / errorMessage */
  FAILED = 'failed',
}

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = [
  JobStatus.COMPLETED,
  JobStatus.FAILED,
];
