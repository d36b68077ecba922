import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import { randomUUID } from 'crypto';
import { buffer as readStream } from 'stream/consumers';
import {
  StorageReadException,
  StorageUploadException,
} from './storage.exceptions';

/** Max length of the sanitized file name suffix in the object key */
const MAX_FILENAME_LENGTH = 100;

/**
 * StorageService: all object storage operations, backed by MinIO
 * (S3-compatible).
 *
 * Object key pattern:  {prefix}/{YYYY}/{uuid}-{sanitized-filename}
 * Example:             analyses/2026/f3a2b1c0-selfie.jpg
 *
 * Generated artifacts use caller-chosen deterministic keys
 * (e.g. certificates/{certificationId}.pdf) so a retried job overwrites
 * rather than duplicates.
 */
@Injectable()
export class StorageService implements OnModuleInit {
  private readonly logger = new Logger(StorageService.name);
  private client!: Minio.Client;
  private readonly bucket: string;
  private readonly endpoint: string;
  private readonly port: number;
  private readonly useSSL: boolean;
  private readonly urlExpirySeconds: number;

  constructor(private readonly configService: ConfigService) {
    this.endpoint = this.configService.get<string>(
      'MINIO_ENDPOINT',
      'localhost',
    );
    this.port = Number(this.configService.get<number>('MINIO_PORT', 9000));
    this.useSSL =
      this.configService.get<string>('MINIO_USE_SSL', 'false') === 'true';
    this.bucket = this.configService.get<string>(
      'MINIO_BUCKET',
      'hairline-uploads',
    );
    this.urlExpirySeconds = Number(
      this.configService.get<number>('STORAGE_URL_EXPIRY_SECONDS', 3600),
    );
  }

  /**
   * Initializes the MinIO client and ensures the bucket exists.
   * Called once when the module bootstraps.
   */
  async onModuleInit(): Promise<void> {
    const accessKey = this.configService.get<string>(
      'MINIO_ACCESS_KEY',
      'minioadmin',
    );
    const secretKey = this.configService.get<string>(
      'MINIO_SECRET_KEY',
      'minioadmin_secret',
    );

    this.client = new Minio.Client({
      endPoint: this.endpoint,
      port: this.port,
      useSSL: this.useSSL,
      accessKey,
      secretKey,
    });

    await this.ensureBucketExists();
    this.logger.log(
      `StorageService ready, bucket: "${this.bucket}" @ ${this.endpoint}:${this.port}`,
    );
  }

  /**
   * Uploads an HTTP upload under a fresh key.
   *
   * @param prefix - top-level folder, e.g. "analyses" or "certifications/{id}"
   * @returns the object key
   * @throws StorageUploadException on any MinIO error
   */
  async uploadFile(
    buffer: Buffer,
    originalName: string,
    mimeType: string,
    prefix: string,
  ): Promise<string> {
    const objectKey = this.buildObjectKey(prefix, originalName);
    await this.putObject(objectKey, buffer, mimeType);
    return objectKey;
  }

  /**
   * Writes (or overwrites) an object at an exact key.
   *
   * @throws StorageUploadException on any MinIO error
   */
  async putObject(
    objectKey: string,
    buffer: Buffer,
    mimeType: string,
  ): Promise<void> {
    const metadata = { 'Content-Type': mimeType };

    this.logger.debug(`Uploading ${objectKey} (${buffer.length} bytes)`);

    try {
      await this.client.putObject(
        this.bucket,
        objectKey,
        buffer,
        buffer.length,
        metadata,
      );
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Failed to upload "${objectKey}" to MinIO: ${cause.message}`,
      );
      throw new StorageUploadException(objectKey, cause);
    }

    this.logger.log(`Uploaded "${objectKey}" (${buffer.length} bytes)`);
  }

  /**
   * Reads a whole object into memory.
   *
   * @throws StorageReadException on any MinIO error
   */
  async getObject(objectKey: string): Promise<Buffer> {
    try {
      const stream = await this.client.getObject(this.bucket, objectKey);
      return await readStream(stream);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Failed to read "${objectKey}" from MinIO: ${cause.message}`,
      );
      throw new StorageReadException(objectKey, cause);
    }
  }

  /**
   * Time-limited GET URL for a client to fetch the object directly.
   *
   * @throws StorageReadException when signing fails
   */
  async getPresignedUrl(objectKey: string): Promise<string> {
    try {
      return await this.client.presignedGetObject(
        this.bucket,
        objectKey,
        this.urlExpirySeconds,
      );
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new StorageReadException(objectKey, cause);
    }
  }

  /**
   * Best-effort removal. Orphaned objects are harmless, so failures are
   * logged and never surface to the caller.
   */
  async removeObjects(objectKeys: ReadonlyArray<string | null>): Promise<void> {
    for (const objectKey of objectKeys) {
      if (!objectKey) {
        continue;
      }

      try {
        await this.client.removeObject(this.bucket, objectKey);
        this.logger.debug(`Removed "${objectKey}"`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Failed to remove "${objectKey}": ${message}`);
      }
    }
  }

  // ── Helpers ────────────────────────────────────────────────

  /**
   * Builds a unique, URL-safe object key.
   * Pattern: {prefix}/{YYYY}/{uuid}-{sanitized-filename}
   */
  private buildObjectKey(prefix: string, originalName: string): string {
    const year = new Date().getFullYear();
    const uuid = randomUUID();
    const sanitized = this.sanitizeFilename(originalName);
    return `${prefix}/${year}/${uuid}-${sanitized}`;
  }

  /**
   * Strips path traversal characters and whitespace, and truncates
   * to MAX_FILENAME_LENGTH characters.
   */
  private sanitizeFilename(filename: string): string {
    return filename
      .replace(/[^a-zA-Z0-9._-]/g, '_')
      .slice(0, MAX_FILENAME_LENGTH)
      .toLowerCase();
  }

  /**
   * Creates the bucket if it does not already exist.
   */
  private async ensureBucketExists(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, 'us-east-1');
        this.logger.log(`Created bucket "${this.bucket}"`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Failed to ensure bucket "${this.bucket}" exists: ${message}`,
      );
      // Non-fatal during init; uploads will fail fast with StorageUploadException
    }
  }
}
