import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * HTTP 402 Payment Required: the route is reserved for premium accounts.
 */
export class PremiumRequiredException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.PAYMENT_REQUIRED,
        error: 'Payment Required',
        message: 'This feature requires a premium subscription',
      },
      HttpStatus.PAYMENT_REQUIRED,
    );
  }
}
