import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CounselingMessage, CounselingSession } from '@hairline/database';
import { CounselingController } from './counseling.controller';
import { CounselingService } from './counseling.service';

@Module({
  imports: [TypeOrmModule.forFeature([CounselingSession, CounselingMessage])],
  controllers: [CounselingController],
  providers: [CounselingService],
})
export class CounselingModule {}
