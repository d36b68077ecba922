import { Injectable, Logger } from '@nestjs/common';
import sharp from 'sharp';
import { StorageService } from '@hairline/storage';
import { JobValidationError, UpstreamError } from '@hairline/queue';
import type { LlmImage } from '../llm/llm.types';

/** Longest edge sent to the model; larger images are scaled down. */
export const MAX_IMAGE_DIMENSION = 1568;
export const JPEG_QUALITY = 85;

/**
 * ImageProcessorService: turns stored uploads into model-ready images.
 *
 * Every image is EXIF-rotated, fit inside MAX_IMAGE_DIMENSION without
 * enlargement and re-encoded as JPEG, whatever format the user sent.
 */
@Injectable()
export class ImageProcessorService {
  private readonly logger = new Logger(ImageProcessorService.name);

  constructor(private readonly storageService: StorageService) {}

  async normalize(data: Buffer): Promise<LlmImage> {
    try {
      const output = await sharp(data)
        .rotate()
        .resize({
          width: MAX_IMAGE_DIMENSION,
          height: MAX_IMAGE_DIMENSION,
          fit: 'inside',
          withoutEnlargement: true,
        })
        .jpeg({ quality: JPEG_QUALITY })
        .toBuffer();

      return { data: output, mediaType: 'image/jpeg' };
    } catch (error) {
      throw new JobValidationError('Image could not be decoded', {
        cause: error,
      });
    }
  }

  /** Reads an object from storage and normalises it. */
  async loadForModel(objectKey: string): Promise<LlmImage> {
    let raw: Buffer;

    try {
      raw = await this.storageService.getObject(objectKey);
    } catch (error) {
      throw new UpstreamError(`Could not read image ${objectKey}`, {
        cause: error,
      });
    }

    const image = await this.normalize(raw);
    this.logger.debug(
      `Prepared ${objectKey}: ${raw.length} → ${image.data.length} bytes`,
    );
    return image;
  }
}
