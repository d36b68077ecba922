import { HttpException, HttpStatus } from '@nestjs/common';

/** Image types the vision model accepts. */
export const ALLOWED_IMAGE_TYPES = [
  'image/jpeg',
  'image/png',
  'image/gif',
  'image/webp',
] as const;

/**
 * HTTP 415 Unsupported Media Type.
 */
export class InvalidMimeTypeException extends HttpException {
  constructor(receivedMimeType: string) {
    super(
      {
        statusCode: HttpStatus.UNSUPPORTED_MEDIA_TYPE,
        error: 'Unsupported Media Type',
        message: `File type "${receivedMimeType}" is not supported. Allowed types: ${ALLOWED_IMAGE_TYPES.join(', ')}`,
      },
      HttpStatus.UNSUPPORTED_MEDIA_TYPE,
    );
  }
}

/**
 * HTTP 400 when the multipart request carries no `file` part.
 */
export class MissingFileException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: 'A file must be attached to the "file" multipart field',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * HTTP 413 Content Too Large.
 */
export class FileTooLargeException extends HttpException {
  constructor(maxSizeMb: number) {
    super(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        error: 'Payload Too Large',
        message: `File exceeds the maximum allowed size of ${maxSizeMb} MB`,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}
