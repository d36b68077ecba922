import { HttpException, HttpStatus, NotFoundException } from '@nestjs/common';

/**
 * HTTP 402: a free account has used its analyses.
 */
export class NoAnalysesRemainingException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.PAYMENT_REQUIRED,
        error: 'Payment Required',
        message:
          'No analyses remaining. Upgrade to premium for unlimited analyses.',
      },
      HttpStatus.PAYMENT_REQUIRED,
    );
  }
}

export class AnalysisNotFoundException extends NotFoundException {
  constructor(analysisId: string) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'Not Found',
      message: `Analysis ${analysisId} not found`,
    });
  }
}

/**
 * HTTP 500: the job row (and quota decrement) could not be committed.
 */
export class AnalysisSubmissionException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: 'Failed to queue the analysis. Please try again.',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}
