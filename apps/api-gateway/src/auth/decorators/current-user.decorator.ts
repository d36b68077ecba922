import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { RequestUser } from '../interfaces';

/**
 * Injects the authenticated user into a handler parameter.
 *
 * ```ts
 * @Get('history')
 * @UseGuards(JwtAuthGuard)
 * history(@CurrentUser() user: RequestUser) { ... }
 * ```
 *
 * Only meaningful behind JwtAuthGuard; without it request.user is unset.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestUser => {
    const request = ctx.switchToHttp().getRequest<{ user: RequestUser }>();
    return request.user;
  },
);
