import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { PremiumRequiredException } from '../exceptions';
import type { RequestUser } from '../interfaces';

/**
 * Lets premium accounts through; everyone else gets 402.
 *
 * Runs after JwtAuthGuard: `@UseGuards(JwtAuthGuard, PremiumGuard)`.
 */
@Injectable()
export class PremiumGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context
      .switchToHttp()
      .getRequest<{ user?: RequestUser }>();

    if (!request.user?.isPremium) {
      throw new PremiumRequiredException();
    }

    return true;
  }
}
