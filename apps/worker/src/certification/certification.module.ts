import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Certification, CertificationPhoto } from '@hairline/database';
import { StorageModule } from '@hairline/storage';
import { LlmModule } from '../llm/llm.module';
import { ImagesModule } from '../images/images.module';
import { CertificateRendererService } from './certificate-renderer.service';
import { PhotoValidationHandler } from './photo-validation.handler';
import { CertificationDiagnosisHandler } from './certification-diagnosis.handler';

@Module({
  imports: [
    TypeOrmModule.forFeature([Certification, CertificationPhoto]),
    StorageModule,
    LlmModule,
    ImagesModule,
  ],
  providers: [
    CertificateRendererService,
    PhotoValidationHandler,
    CertificationDiagnosisHandler,
  ],
  exports: [PhotoValidationHandler, CertificationDiagnosisHandler],
})
export class CertificationModule {}
