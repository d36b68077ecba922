import {
  CertificationStatus,
  PhotoSlot,
  PhotoValidationStatus,
} from '@hairline/database';
import {
  cooldownDaysRemaining,
  isAcceptingPhotos,
  missingApprovedSlots,
  sortBySlot,
} from './certification.rules';

describe('certification rules', () => {
  describe('cooldownDaysRemaining', () => {
    const now = new Date('2026-03-31T12:00:00Z');

    it('is zero without a previous certification', () => {
      expect(cooldownDaysRemaining(null, 30, now)).toBe(0);
    });

    it('rounds partial days up', () => {
      const last = new Date('2026-03-10T00:00:00Z');
      // available 2026-04-09T00:00Z, 8.5 days away
      expect(cooldownDaysRemaining(last, 30, now)).toBe(9);
    });

    it('is zero once the cooldown has passed', () => {
      expect(
        cooldownDaysRemaining(new Date('2026-02-01T00:00:00Z'), 30, now),
      ).toBe(0);
      expect(
        cooldownDaysRemaining(new Date('2026-03-01T12:00:00Z'), 30, now),
      ).toBe(0);
    });
  });

  it('accepts photos only while photos are pending', () => {
    expect(isAcceptingPhotos(CertificationStatus.PHOTOS_PENDING)).toBe(true);
    expect(isAcceptingPhotos(CertificationStatus.ANALYZING)).toBe(false);
    expect(isAcceptingPhotos(CertificationStatus.FAILED)).toBe(false);
  });

  it('lists slots without an approved photo in slot order', () => {
    expect(
      missingApprovedSlots([
        { slot: PhotoSlot.RIGHT, validationStatus: PhotoValidationStatus.PENDING },
        { slot: PhotoSlot.LEFT, validationStatus: PhotoValidationStatus.APPROVED },
      ]),
    ).toEqual([PhotoSlot.FRONT, PhotoSlot.RIGHT]);
    expect(missingApprovedSlots([])).toEqual([
      PhotoSlot.FRONT,
      PhotoSlot.LEFT,
      PhotoSlot.RIGHT,
    ]);
  });

  it('sorts photos front, left, right', () => {
    const sorted = sortBySlot([
      { slot: PhotoSlot.RIGHT },
      { slot: PhotoSlot.FRONT },
      { slot: PhotoSlot.LEFT },
    ]);

    expect(sorted.map((photo) => photo.slot)).toEqual([
      PhotoSlot.FRONT,
      PhotoSlot.LEFT,
      PhotoSlot.RIGHT,
    ]);
  });
});
