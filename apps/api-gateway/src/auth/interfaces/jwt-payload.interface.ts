/**
 * Claims signed into every access token.
 */
export interface JwtPayload {
  /** User id (ULID) */
  sub: string;
  email: string;
}
