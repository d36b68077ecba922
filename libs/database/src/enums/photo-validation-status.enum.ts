/**
 * Validation verdict of a single certification photo.
 *
 * An APPROVED photo is immutable until the client explicitly deletes it.
 */
export enum PhotoValidationStatus {
  /** Uploaded, validation job queued or running */
  PENDING = 'pending',

  APPROVED = 'approved',

  /** See rejectionReason; the slot accepts a new upload */
  REJECTED = 'rejected',
}
