import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ForumAgentSchedule, JobType } from '@hairline/database';
import { ForumThreadPayload, forumThreadPayloadSchema } from '@hairline/queue';
import { JobHandler, JobResult } from '../jobs/job-handler';
import { bumpedReplyAt, shouldBump } from './forum-schedule';

/**
 * Pulls a thread's personas forward after a user posts, so the thread
 * answers within minutes even when their backoff has grown to hours.
 */
@Injectable()
export class ForumScheduleBumpHandler extends JobHandler<ForumThreadPayload> {
  readonly type = JobType.FORUM_SCHEDULE_BUMP;
  protected readonly payloadSchema = forumThreadPayloadSchema;
  private readonly logger = new Logger(ForumScheduleBumpHandler.name);

  constructor(
    @InjectRepository(ForumAgentSchedule)
    private readonly scheduleRepository: Repository<ForumAgentSchedule>,
  ) {
    super();
  }

  protected async handle({ threadId }: ForumThreadPayload): Promise<JobResult> {
    const schedules = await this.scheduleRepository.find({
      where: { threadId, isActive: true },
      order: { nextReplyAt: 'ASC' },
    });

    const now = new Date();
    let bumped = 0;

    for (const [index, schedule] of schedules.entries()) {
      if (!schedule.nextReplyAt || !shouldBump(schedule.nextReplyAt, now)) {
        continue;
      }

      // Conditioned on the old time: the scheduler may have just claimed it
      const outcome = await this.scheduleRepository.update(
        { id: schedule.id, nextReplyAt: schedule.nextReplyAt },
        { nextReplyAt: bumpedReplyAt(index, now) },
      );
      bumped += outcome.affected ?? 0;
    }

    if (bumped > 0) {
      this.logger.log(`Thread ${threadId}: bumped ${bumped} persona(s)`);
    }

    return { threadId, bumped };
  }
}
