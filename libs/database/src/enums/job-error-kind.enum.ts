/**
 * Closed classification of job failures, stored on failed jobs and
 * returned to pollers so clients can tell transient from permanent errors.
 */
export enum JobErrorKind {
  /** LLM or storage call failed, or the model returned no usable result. Retryable. */
  UPSTREAM = 'upstream',

  /** Input cannot be processed (bad payload, wrong state, undecodable image) */
  VALIDATION = 'validation',

  /** A row the job depends on no longer exists */
  NOT_FOUND = 'not_found',

  /** Anything else */
  INTERNAL = 'internal',
}
