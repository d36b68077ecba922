import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { UploadValidator } from './upload-validator.service';

@Module({
  imports: [ConfigModule],
  providers: [UploadValidator],
  exports: [UploadValidator],
})
export class UploadsModule {}
