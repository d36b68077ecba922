import { Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/**
 * Bearer-token guard for every authenticated route.
 *
 * Replaces Passport's bare "Unauthorized" with a message naming what was
 * wrong with the token.
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  handleRequest<TUser>(
    err: Error | null,
    user: TUser | false,
    info: Error | undefined,
  ): TUser {
    if (err) {
      this.logger.warn(`JWT auth error: ${err.message}`);
      throw new UnauthorizedException(err.message);
    }

    if (!user) {
      const message = jwtFailureMessage(info);
      this.logger.debug(`JWT auth rejected: ${message}`);
      throw new UnauthorizedException(message);
    }

    return user;
  }
}

export function jwtFailureMessage(info: Error | undefined): string {
  if (!info) {
    return 'Authentication token is missing';
  }

  if (info.name === 'TokenExpiredError') {
    return 'Authentication token has expired';
  }

  if (info.name === 'JsonWebTokenError') {
    return 'Invalid authentication token';
  }

  return info.message || 'Authentication failed';
}
