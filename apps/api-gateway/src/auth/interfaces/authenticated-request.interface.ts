import type { Request } from 'express';

/**
 * request.user after JwtStrategy.validate(). The account flags are read
 * fresh from the database on every request, so revoking premium takes
 * effect without re-issuing tokens.
 */
export interface RequestUser {
  userId: string;
  email: string;
  isPremium: boolean;
  isAdmin: boolean;
}

export interface AuthenticatedRequest extends Request {
  user: RequestUser;
}
