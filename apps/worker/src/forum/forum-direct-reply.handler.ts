import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, IsNull, Not, Repository } from 'typeorm';
import {
  ForumPersona,
  ForumReply,
  ForumThread,
  GenerationStatus,
  Job,
  JobType,
} from '@hairline/database';
import {
  ForumDirectReplyPayload,
  JobError,
  JobNotFoundError,
  forumDirectReplyPayloadSchema,
} from '@hairline/queue';
import { JobHandler, JobResult } from '../jobs/job-handler';
import { ForumReplyDrafter } from './forum-reply-drafter.service';

/**
 * Answers a user who replied to a persona, nested under the user's reply.
 *
 * The persona the user was talking to answers when it is still active;
 * otherwise any active persona does. A retry keeps the persona of the
 * PROCESSING row an earlier attempt opened.
 */
@Injectable()
export class ForumDirectReplyHandler extends JobHandler<ForumDirectReplyPayload> {
  readonly type = JobType.FORUM_DIRECT_REPLY;
  protected readonly payloadSchema = forumDirectReplyPayloadSchema;
  private readonly logger = new Logger(ForumDirectReplyHandler.name);

  constructor(
    @InjectRepository(ForumThread)
    private readonly threadRepository: Repository<ForumThread>,
    @InjectRepository(ForumReply)
    private readonly replyRepository: Repository<ForumReply>,
    @InjectRepository(ForumPersona)
    private readonly personaRepository: Repository<ForumPersona>,
    private readonly drafter: ForumReplyDrafter,
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  protected async handle({
    threadId,
    parentReplyId,
  }: ForumDirectReplyPayload): Promise<JobResult> {
    const thread = await this.threadRepository.findOne({
      where: { id: threadId },
      relations: { user: true },
    });
    if (!thread) {
      throw new JobNotFoundError('Forum thread', threadId);
    }

    const userReply = await this.replyRepository.findOne({
      where: { id: parentReplyId, threadId },
      relations: { user: true },
    });
    if (!userReply) {
      throw new JobNotFoundError('Forum reply', parentReplyId);
    }

    const persona = await this.choosePersona(userReply);
    const reply = await this.drafter.openReply(
      threadId,
      persona.id,
      userReply.id,
    );
    const content = await this.drafter.draft(persona, thread, userReply);

    await this.dataSource.transaction(async (manager) => {
      await manager.update(ForumReply, reply.id, {
        content,
        status: GenerationStatus.COMPLETED,
      });
      await manager.update(ForumThread, threadId, { updatedAt: new Date() });
    });

    this.logger.log(
      `${persona.name} answered reply ${userReply.id} in thread ${threadId}`,
    );

    return { replyId: reply.id, personaId: persona.id };
  }

  protected async onFailed(
    { threadId, parentReplyId }: ForumDirectReplyPayload,
    _job: Job,
    _error: JobError,
  ): Promise<void> {
    await this.drafter.abandon(threadId, parentReplyId);
  }

  private async choosePersona(userReply: ForumReply): Promise<ForumPersona> {
    const opened = await this.replyRepository.findOne({
      where: {
        threadId: userReply.threadId,
        parentId: userReply.id,
        personaId: Not(IsNull()),
        status: GenerationStatus.PROCESSING,
      },
      relations: { persona: true },
    });
    if (opened?.persona) {
      return opened.persona;
    }

    if (userReply.parentId) {
      const repliedTo = await this.replyRepository.findOne({
        where: { id: userReply.parentId },
        relations: { persona: true },
      });
      if (repliedTo?.persona?.isActive) {
        return repliedTo.persona;
      }
    }

    const personas = await this.personaRepository.find({
      where: { isActive: true },
    });
    if (personas.length === 0) {
      throw new JobNotFoundError('Active forum persona for reply', userReply.id);
    }

    return personas[Math.floor(Math.random() * personas.length)];
  }
}
