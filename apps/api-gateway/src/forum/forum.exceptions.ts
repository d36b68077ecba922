import { ForbiddenException, HttpStatus, NotFoundException } from '@nestjs/common';

export class ThreadNotFoundException extends NotFoundException {
  constructor() {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'Not Found',
      message: 'Thread not found',
    });
  }
}

export class ReplyNotFoundException extends NotFoundException {
  constructor() {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'Not Found',
      message: 'Reply not found',
    });
  }
}

/** Only the author of a thread, or an admin, may delete it. */
export class ThreadDeleteForbiddenException extends ForbiddenException {
  constructor() {
    super({
      statusCode: HttpStatus.FORBIDDEN,
      error: 'Forbidden',
      message: 'Not authorized to delete this thread',
    });
  }
}
