/**
 * Norwood-Hamilton pattern variants.
 */
export enum NorwoodVariant {
  /** Anterior: front-to-back recession without a distinct vertex island */
  ANTERIOR = 'A',

  /** Vertex: crown thinning with the frontal band maintained */
  VERTEX = 'V',
}
