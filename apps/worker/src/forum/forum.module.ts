import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  ForumAgentSchedule,
  ForumPersona,
  ForumReply,
  ForumThread,
} from '@hairline/database';
import { LlmModule } from '../llm/llm.module';
import { ForumReplyDrafter } from './forum-reply-drafter.service';
import { ForumScheduleInitHandler } from './forum-schedule-init.handler';
import { ForumScheduleBumpHandler } from './forum-schedule-bump.handler';
import { ForumAgentReplyHandler } from './forum-agent-reply.handler';
import { ForumDirectReplyHandler } from './forum-direct-reply.handler';
import { ForumSchedulerService } from './forum-scheduler.service';

/**
 * ForumModule (worker): persona scheduling and reply generation.
 *
 * JobSubmitter comes from the global QueueModule registered in AppModule.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([
      ForumThread,
      ForumReply,
      ForumPersona,
      ForumAgentSchedule,
    ]),
    LlmModule,
  ],
  providers: [
    ForumReplyDrafter,
    ForumScheduleInitHandler,
    ForumScheduleBumpHandler,
    ForumAgentReplyHandler,
    ForumDirectReplyHandler,
    ForumSchedulerService,
  ],
  exports: [
    ForumScheduleInitHandler,
    ForumScheduleBumpHandler,
    ForumAgentReplyHandler,
    ForumDirectReplyHandler,
  ],
})
export class ForumModule {}
