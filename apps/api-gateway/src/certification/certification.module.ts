import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Certification, CertificationPhoto } from '@hairline/database';
import { StorageModule } from '@hairline/storage';
import { UploadsModule } from '../uploads/uploads.module';
import { CertificationService } from './certification.service';
import {
  CertificationController,
  PublicCertificationController,
} from './certification.controller';

@Module({
  imports: [
    TypeOrmModule.forFeature([Certification, CertificationPhoto]),
    StorageModule,
    UploadsModule,
  ],
  // Public first so "public/:id" is matched before the guarded routes
  controllers: [PublicCertificationController, CertificationController],
  providers: [CertificationService],
})
export class CertificationModule {}
