import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, IsNull, Repository } from 'typeorm';
import {
  ForumAgentSchedule,
  ForumReply,
  ForumThread,
  GenerationStatus,
  Job,
  JobType,
} from '@hairline/database';
import {
  ForumAgentReplyPayload,
  JobError,
  JobNotFoundError,
  forumAgentReplyPayloadSchema,
} from '@hairline/queue';
import { JobHandler, JobResult } from '../jobs/job-handler';
import { ForumReplyDrafter } from './forum-reply-drafter.service';
import { nextReplyAt } from './forum-schedule';

/**
 * Posts one scheduled persona reply and books the persona's next visit.
 *
 * The scheduler cleared `nextReplyAt` when it created this job; it is set
 * again here on success, or by onFailed, so the persona is never lost.
 */
@Injectable()
export class ForumAgentReplyHandler extends JobHandler<ForumAgentReplyPayload> {
  readonly type = JobType.FORUM_AGENT_REPLY;
  protected readonly payloadSchema = forumAgentReplyPayloadSchema;
  private readonly logger = new Logger(ForumAgentReplyHandler.name);

  constructor(
    @InjectRepository(ForumAgentSchedule)
    private readonly scheduleRepository: Repository<ForumAgentSchedule>,
    private readonly drafter: ForumReplyDrafter,
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  protected async handle({
    scheduleId,
  }: ForumAgentReplyPayload): Promise<JobResult> {
    const schedule = await this.scheduleRepository.findOne({
      where: { id: scheduleId },
      relations: { persona: true, thread: { user: true } },
    });

    if (!schedule) {
      throw new JobNotFoundError('Forum schedule', scheduleId);
    }

    if (!schedule.isActive || !schedule.persona.isActive) {
      this.logger.debug(`Schedule ${scheduleId} is inactive, skipping`);
      return { scheduleId, skipped: true };
    }

    const reply = await this.drafter.openReply(
      schedule.threadId,
      schedule.personaId,
      null,
    );
    const content = await this.drafter.draft(schedule.persona, schedule.thread);

    const now = new Date();
    const replyCount = schedule.replyCount + 1;

    await this.dataSource.transaction(async (manager) => {
      await manager.update(ForumReply, reply.id, {
        content,
        status: GenerationStatus.COMPLETED,
      });
      await manager.update(ForumAgentSchedule, schedule.id, {
        replyCount,
        lastRepliedAt: now,
        nextReplyAt: nextReplyAt(replyCount, now),
      });
      await manager.update(ForumThread, schedule.threadId, { updatedAt: now });
    });

    this.logger.log(
      `${schedule.persona.name} replied in thread ${schedule.threadId} (#${replyCount})`,
    );

    return { replyId: reply.id, personaId: schedule.personaId };
  }

  protected async onFailed(
    { scheduleId }: ForumAgentReplyPayload,
    _job: Job,
    _error: JobError,
  ): Promise<void> {
    const schedule = await this.scheduleRepository.findOne({
      where: { id: scheduleId },
    });

    if (!schedule) {
      return;
    }

    await this.drafter.abandon(schedule.threadId, null, schedule.personaId);
    await this.scheduleRepository.update(
      { id: schedule.id, nextReplyAt: IsNull() },
      { nextReplyAt: nextReplyAt(schedule.replyCount, new Date()) },
    );
  }
}
