/**
 * Injection tokens for the queue module.
 *
 * The producer and consumer are separate ioredis connections: BRPOP
 * blocks its connection for up to the pop timeout, which would stall any
 * LPUSH sharing it.
 */
export const QUEUE_PRODUCER_CLIENT = 'QUEUE_PRODUCER_CLIENT';
export const QUEUE_CONSUMER_CLIENT = 'QUEUE_CONSUMER_CLIENT';
export const JOB_QUEUE_KEY = 'JOB_QUEUE_KEY';

export const DEFAULT_JOB_QUEUE_KEY = 'hairline:jobs';
