/**
 * Certification workflow state.
 *
 * Transitions:
 *   PHOTOS_PENDING → ANALYZING → COMPLETED
 *         │              │
 *         └──────────────┴────→ FAILED
 *
 * ANALYZING is entered only once all three photo slots are approved.
 * COMPLETED and FAILED are terminal.
 */
export enum CertificationStatus {
  PHOTOS_PENDING = 'photos_pending',
  ANALYZING = 'analyzing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export const NON_TERMINAL_CERTIFICATION_STATUSES: readonly CertificationStatus[] =
  [CertificationStatus.PHOTOS_PENDING, CertificationStatus.ANALYZING];
