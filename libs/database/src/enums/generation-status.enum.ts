/**
 * State of content produced by a background job: persona forum replies
 * and assistant counseling messages.
 *
 * Transitions:
 *   PENDING → PROCESSING → COMPLETED
 *                        → FAILED
 *
 * Content written directly by users is stored as COMPLETED.
 */
export enum GenerationStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}
