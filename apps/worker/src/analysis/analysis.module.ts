import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Analysis, User } from '@hairline/database';
import { LlmModule } from '../llm/llm.module';
import { ImagesModule } from '../images/images.module';
import { AnalysisJobHandler } from './analysis-job.handler';

@Module({
  imports: [TypeOrmModule.forFeature([Analysis, User]), LlmModule, ImagesModule],
  providers: [AnalysisJobHandler],
  exports: [AnalysisJobHandler],
})
export class AnalysisModule {}
