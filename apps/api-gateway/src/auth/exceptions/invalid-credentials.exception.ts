import { UnauthorizedException } from '@nestjs/common';

/**
 * HTTP 401 for any failed login. Unknown email, wrong password and a
 * deactivated account all read the same.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Invalid email or password',
    });
  }
}
