import {
  CertificationPhoto,
  CertificationStatus,
  PHOTO_SLOTS,
  PhotoSlot,
  PhotoValidationStatus,
} from '@hairline/database';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Whole days until a new certification may start; 0 once the cooldown
 * has passed or when there has never been a completed one.
 */
export function cooldownDaysRemaining(
  lastCertifiedAt: Date | null,
  cooldownDays: number,
  now: Date,
): number {
  if (!lastCertifiedAt) {
    return 0;
  }

  const availableAt = lastCertifiedAt.getTime() + cooldownDays * MS_PER_DAY;
  return Math.max(0, Math.ceil((availableAt - now.getTime()) / MS_PER_DAY));
}

export function isAcceptingPhotos(status: CertificationStatus): boolean {
  return status === CertificationStatus.PHOTOS_PENDING;
}

/** Slots without an approved photo, in front/left/right order. */
export function missingApprovedSlots(
  photos: ReadonlyArray<Pick<CertificationPhoto, 'slot' | 'validationStatus'>>,
): PhotoSlot[] {
  const approved = new Set(
    photos
      .filter((photo) => photo.validationStatus === PhotoValidationStatus.APPROVED)
      .map((photo) => photo.slot),
  );

  return PHOTO_SLOTS.filter((slot) => !approved.has(slot));
}

/** Orders photos front, left, right for display. */
export function sortBySlot<T extends Pick<CertificationPhoto, 'slot'>>(
  photos: readonly T[],
): T[] {
  return [...photos].sort(
    (a, b) => PHOTO_SLOTS.indexOf(a.slot) - PHOTO_SLOTS.indexOf(b.slot),
  );
}
