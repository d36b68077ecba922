/**
 * @hairline/queue
 *
 * Redis-backed job queue shared by the api-gateway and the worker.
 */
export { QueueModule } from './queue.module';
export type { QueueModuleOptions } from './queue.module';
export { JobQueueProducer } from './job-queue.producer';
export { JobQueueConsumer } from './job-queue.consumer';
export { JobSubmitter } from './job-submitter.service';
export { QueueHealthIndicator } from './queue.health';
export {
  JobError,
  UpstreamError,
  JobValidationError,
  JobNotFoundError,
  InternalJobError,
  toJobError,
} from './job-errors';
export * from './job-payloads';
export {
  QUEUE_PRODUCER_CLIENT,
  QUEUE_CONSUMER_CLIENT,
  JOB_QUEUE_KEY,
  DEFAULT_JOB_QUEUE_KEY,
} from './queue.constants';
