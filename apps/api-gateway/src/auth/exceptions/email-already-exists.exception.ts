import { ConflictException } from '@nestjs/common';

/** HTTP 409: an account with this email is already registered. */
export class EmailAlreadyExistsException extends ConflictException {
  constructor(email: string) {
    super({
      statusCode: 409,
      error: 'Conflict',
      message: `User with email "${email}" already exists`,
    });
  }
}
