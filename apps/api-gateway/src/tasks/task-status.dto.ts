import {
  Job,
  JobErrorKind,
  JobStatus,
  JsonObject,
  TERMINAL_JOB_STATUSES,
} from '@hairline/database';

/**
 * Polling view of a job. `result` is set only once completed;
 * `error` and `errorKind` only once failed.
 */
export class TaskStatusDto {
  taskId!: string;
  status!: JobStatus;
  ready!: boolean;
  result!: JsonObject | null;
  error!: string | null;
  errorKind!: JobErrorKind | null;

  static fromJob(job: Job): TaskStatusDto {
    const failed = job.status === JobStatus.FAILED;

    return Object.assign(new TaskStatusDto(), {
      taskId: job.id,
      status: job.status,
      ready: TERMINAL_JOB_STATUSES.includes(job.status),
      result: job.status === JobStatus.COMPLETED ? job.result : null,
      error: failed ? job.errorMessage : null,
      errorKind: failed ? job.errorKind : null,
    });
  }
}
