import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  Analysis,
  CounselingMessage,
  CounselingSession,
} from '@hairline/database';
import { LlmModule } from '../llm/llm.module';
import { CounselingReplyHandler } from './counseling-reply.handler';

@Module({
  imports: [
    TypeOrmModule.forFeature([CounselingMessage, CounselingSession, Analysis]),
    LlmModule,
  ],
  providers: [CounselingReplyHandler],
  exports: [CounselingReplyHandler],
})
export class CounselingModule {}
