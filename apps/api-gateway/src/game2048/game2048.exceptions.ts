import { BadRequestException, HttpStatus } from '@nestjs/common';

export class InvalidTileException extends BadRequestException {
  constructor(tile: number) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'Bad Request',
      message: `highestTile must be a power of two, got ${tile}`,
    });
  }
}
