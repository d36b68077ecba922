import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { PremiumGuard } from './premium.guard';
import { PremiumRequiredException } from '../exceptions';
import type { RequestUser } from '../interfaces';

function contextFor(user: RequestUser | undefined): ExecutionContextHost {
  return new ExecutionContextHost([{ user }]);
}

function thrownBy(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('PremiumGuard', () => {
  const guard = new PremiumGuard();
  const base: RequestUser = {
    userId: 'u1',
    email: 'sam@example.com',
    isPremium: false,
    isAdmin: false,
  };

  it('lets premium users through', () => {
    expect(guard.canActivate(contextFor({ ...base, isPremium: true }))).toBe(true);
  });

  it('answers 402 for a free account', () => {
    const error = thrownBy(() => guard.canActivate(contextFor(base)));

    expect(error).toBeInstanceOf(PremiumRequiredException);
    if (error instanceof PremiumRequiredException) {
      expect(error.getStatus()).toBe(402);
      expect(error.getResponse()).toEqual({
        statusCode: 402,
        error: 'Payment Required',
        message: 'This feature requires a premium subscription',
      });
    }
  });

  it('answers 402 when no user was attached', () => {
    expect(() => guard.canActivate(contextFor(undefined))).toThrow(
      PremiumRequiredException,
    );
  });
});
