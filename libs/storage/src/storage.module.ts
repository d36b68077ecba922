import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { StorageService } from './storage.service';

/**
 * StorageModule: provides object storage access via MinIO.
 *
 * Imported by gateway feature modules (uploads, presigned URLs) and by
 * worker handlers (reading photos, writing certificates).
 */
@Module({
  imports: [ConfigModule],
  providers: [StorageService],
  exports: [StorageService],
})
export class StorageModule {}
