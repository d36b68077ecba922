import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Analysis, User } from '@hairline/database';
import { StorageModule } from '@hairline/storage';
import { UploadsModule } from '../uploads/uploads.module';
import { AnalysesService } from './analyses.service';
import { AnalyzeController } from './analyze.controller';
import { AnalysesController } from './analyses.controller';

/**
 * AnalysesModule: analysis submission and history.
 *
 * JobSubmitter comes from the global QueueModule.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([Analysis, User]),
    StorageModule,
    UploadsModule,
  ],
  controllers: [AnalyzeController, AnalysesController],
  providers: [AnalysesService],
})
export class AnalysesModule {}
