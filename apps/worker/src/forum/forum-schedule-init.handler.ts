import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import {
  ForumAgentSchedule,
  ForumPersona,
  ForumThread,
  JobType,
} from '@hairline/database';
import {
  ForumThreadPayload,
  JobNotFoundError,
  forumThreadPayloadSchema,
} from '@hairline/queue';
import { JobHandler, JobResult } from '../jobs/job-handler';
import { initialReplyAt, pickParticipants } from './forum-schedule';

/** Picks the personas that will join a new thread and staggers their first replies. */
@Injectable()
export class ForumScheduleInitHandler extends JobHandler<ForumThreadPayload> {
  readonly type = JobType.FORUM_SCHEDULE_INIT;
  protected readonly payloadSchema = forumThreadPayloadSchema;
  private readonly logger = new Logger(ForumScheduleInitHandler.name);

  constructor(
    @InjectRepository(ForumThread)
    private readonly threadRepository: Repository<ForumThread>,
    @InjectRepository(ForumPersona)
    private readonly personaRepository: Repository<ForumPersona>,
    @InjectRepository(ForumAgentSchedule)
    private readonly scheduleRepository: Repository<ForumAgentSchedule>,
  ) {
    super();
  }

  protected async handle({ threadId }: ForumThreadPayload): Promise<JobResult> {
    const thread = await this.threadRepository.findOne({
      where: { id: threadId },
    });

    if (!thread) {
      throw new JobNotFoundError('Forum thread', threadId);
    }

    // A retried attempt finds the schedules the first one saved
    const existing = await this.scheduleRepository.find({
      where: { threadId },
    });
    if (existing.length > 0) {
      return { threadId, personaIds: existing.map((s) => s.personaId) };
    }

    const personas = await this.personaRepository.find({
      where: { isActive: true },
    });
    if (personas.length === 0) {
      throw new JobNotFoundError('Active forum persona for thread', threadId);
    }

    const now = new Date();
    const participants = pickParticipants(personas);
    const schedules = participants.map((persona, index) =>
      this.scheduleRepository.create({
        threadId,
        personaId: persona.id,
        nextReplyAt: initialReplyAt(index, now),
        replyCount: 0,
        lastRepliedAt: null,
        isActive: true,
      }),
    );

    await this.scheduleRepository.save(schedules);

    this.logger.log(
      `Thread ${threadId}: scheduled ${participants.map((p) => p.name).join(', ')}`,
    );

    return { threadId, personaIds: participants.map((p) => p.id) };
  }
}
