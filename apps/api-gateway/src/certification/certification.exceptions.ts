import {
  BadRequestException,
  ConflictException,
  HttpException,
  HttpStatus,
  NotFoundException,
} from '@nestjs/common';
import { PhotoSlot } from '@hairline/database';

export class CertificationNotFoundException extends NotFoundException {
  constructor() {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'Not Found',
      message: 'Certification not found',
    });
  }
}

/**
 * HTTP 429: the last completed certification is inside the cooldown.
 */
export class CertificationCooldownException extends HttpException {
  constructor(daysRemaining: number) {
    super(
      {
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        error: 'Too Many Requests',
        message: `You can only certify once per month. ${daysRemaining} days remaining.`,
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}

export class NotAcceptingPhotosException extends BadRequestException {
  constructor() {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'Bad Request',
      message: 'Certification is not accepting photos',
    });
  }
}

/** Approved slots are only replaced through the explicit DELETE. */
export class PhotoAlreadyApprovedException extends ConflictException {
  constructor(slot: PhotoSlot) {
    super({
      statusCode: HttpStatus.CONFLICT,
      error: 'Conflict',
      message: `${slot} photo already approved`,
    });
  }
}

export class PhotoNotFoundException extends NotFoundException {
  constructor(slot: PhotoSlot) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'Not Found',
      message: `No ${slot} photo to remove`,
    });
  }
}

export class DiagnosisNotAllowedException extends BadRequestException {
  constructor() {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'Bad Request',
      message: 'Certification already processing or complete',
    });
  }
}

export class MissingApprovedPhotosException extends BadRequestException {
  constructor(missing: readonly PhotoSlot[]) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'Bad Request',
      message: `Missing approved photos: ${missing.join(', ')}`,
    });
  }
}

export class PdfNotReadyException extends NotFoundException {
  constructor() {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'Not Found',
      message: 'PDF not yet generated',
    });
  }
}

/**
 * HTTP 500: a certification write could not be committed.
 */
export class CertificationPersistenceException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: 'Failed to save the certification. Please try again.',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}
