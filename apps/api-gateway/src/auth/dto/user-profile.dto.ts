import { User, UserOptions } from '@hairline/database';

/**
 * Account view returned by /auth/me. Built only through fromEntity so the
 * password hash never reaches a response.
 */
export class UserProfileDto {
  id!: string;
  email!: string;
  fullName!: string;
  isPremium!: boolean;
  isAdmin!: boolean;
  freeAnalysesRemaining!: number;
  options!: UserOptions;
  createdAt!: Date;

  private constructor() {}

  static fromEntity(user: User): UserProfileDto {
    return Object.assign(new UserProfileDto(), {
      id: user.id,
      email: user.email,
      fullName: user.fullName,
      isPremium: user.isPremium,
      isAdmin: user.isAdmin,
      freeAnalysesRemaining: user.freeAnalysesRemaining,
      options: user.options,
      createdAt: user.createdAt,
    });
  }
}
