/** Injection token for the array of every registered job handler. */
export const JOB_HANDLERS = 'JOB_HANDLERS';

export const DEFAULT_JOB_MAX_ATTEMPTS = 3;
export const DEFAULT_JOB_POP_TIMEOUT_SECONDS = 5;
export const DEFAULT_JOB_RECOVERY_INTERVAL_MS = 60_000;
export const DEFAULT_JOB_STALE_AFTER_MS = 10 * 60_000;

/** Upper bound on jobs the recovery sweep touches per pass. */
export const RECOVERY_BATCH_SIZE = 100;

/** Pause after a failed pop before asking Redis again. */
export const CONSUMER_ERROR_BACKOFF_MS = 1_000;
