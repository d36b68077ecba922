/** Fixed camera angles a certification needs, one photo each. */
export enum PhotoSlot {
  FRONT = 'front',
  LEFT = 'left',
  RIGHT = 'right',
}

export const PHOTO_SLOTS: readonly PhotoSlot[] = [
  PhotoSlot.FRONT,
  PhotoSlot.LEFT,
  PhotoSlot.RIGHT,
];
