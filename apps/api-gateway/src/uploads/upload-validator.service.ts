import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { memoryStorage } from 'multer';
import {
  ALLOWED_IMAGE_TYPES,
  FileTooLargeException,
  InvalidMimeTypeException,
  MissingFileException,
} from './uploads.exceptions';

const BYTES_PER_MB = 1024 * 1024;

/**
 * Multer options for image routes: the buffer stays in memory and goes
 * straight to object storage. The hard cap sits above any sensible
 * UPLOAD_MAX_FILE_SIZE_MB so the 413 below is what clients see.
 */
export const IMAGE_UPLOAD_OPTIONS = {
  storage: memoryStorage(),
  limits: {
    fileSize: 50 * BYTES_PER_MB,
  },
};

/** Presence, type and size checks shared by every image upload route. */
@Injectable()
export class UploadValidator {
  private readonly maxFileSizeMb: number;

  constructor(configService: ConfigService) {
    this.maxFileSizeMb = Number(
      configService.get<number>('UPLOAD_MAX_FILE_SIZE_MB', 10),
    );
  }

  /**
   * @throws MissingFileException (400), InvalidMimeTypeException (415),
   *   FileTooLargeException (413)
   */
  assertImage(
    file: Express.Multer.File | undefined,
  ): asserts file is Express.Multer.File {
    if (!file || !file.buffer || file.size === 0) {
      throw new MissingFileException();
    }

    const allowed: readonly string[] = ALLOWED_IMAGE_TYPES;
    if (!allowed.includes(file.mimetype)) {
      throw new InvalidMimeTypeException(file.mimetype);
    }

    if (file.size > this.maxFileSizeMb * BYTES_PER_MB) {
      throw new FileTooLargeException(this.maxFileSizeMb);
    }
  }
}
