import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import {
  ForumReply,
  ForumThread,
  GenerationStatus,
  Job,
  JobType,
} from '@hairline/database';
import { JobSubmitter } from '@hairline/queue';
import type { RequestUser } from '../auth';
import { CreateReplyDto, CreateThreadDto } from './dto/forum-request.dto';
import {
  ReplyDto,
  ReplyStatusDto,
  ThreadDetailDto,
  ThreadListDto,
  ThreadListItemDto,
  toReplyDto,
} from './dto/forum-response.dto';
import {
  ReplyNotFoundException,
  ThreadDeleteForbiddenException,
  ThreadNotFoundException,
} from './forum.exceptions';

interface ReplyStatsRow {
  threadId: string;
  replyCount: string;
  lastReplyAt: Date | null;
}

/**
 * ForumService: threads and user replies.
 *
 * Persona replies are never written here. Creating a thread queues the
 * schedule init job; a user reply either bumps the thread's schedules or,
 * when it answers a persona, asks for a direct reply. Both are system
 * jobs with no owning user.
 */
@Injectable()
export class ForumService {
  private readonly logger = new Logger(ForumService.name);

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(ForumThread)
    private readonly threadRepository: Repository<ForumThread>,
    @InjectRepository(ForumReply)
    private readonly replyRepository: Repository<ForumReply>,
    private readonly jobSubmitter: JobSubmitter,
  ) {}

  async listThreads(page: number, perPage: number): Promise<ThreadListDto> {
    const [threads, total] = await this.threadRepository.findAndCount({
      relations: { user: true },
      order: { isPinned: 'DESC', updatedAt: 'DESC' },
      skip: (page - 1) * perPage,
      take: perPage,
    });

    const stats = await this.replyStats(threads.map((thread) => thread.id));

    return {
      threads: threads.map((thread) => {
        const row = stats.get(thread.id);
        return this.toListItem(
          thread,
          row ? Number(row.replyCount) : 0,
          row?.lastReplyAt ?? null,
        );
      }),
      total,
      page,
      perPage,
    };
  }

  async createThread(
    user: RequestUser,
    dto: CreateThreadDto,
  ): Promise<ThreadListItemDto> {
    const saved = await this.threadRepository.save(
      this.threadRepository.create({
        userId: user.userId,
        title: dto.title,
        content: dto.content,
        isPinned: false,
      }),
    );

    await this.jobSubmitter.submit(
      JobType.FORUM_SCHEDULE_INIT,
      { threadId: saved.id },
      null,
    );
    this.logger.log(`Thread ${saved.id} created by user ${user.userId}`);

    const thread = await this.findThread(saved.id);
    return this.toListItem(thread, 0, null);
  }

  async getThread(threadId: string): Promise<ThreadDetailDto> {
    const thread = await this.findThread(threadId);
    const replies = await this.replyRepository.find({
      where: { threadId },
      relations: { user: true, persona: true },
      order: { createdAt: 'ASC' },
    });

    return {
      id: thread.id,
      title: thread.title,
      content: thread.content,
      author: { id: thread.user.id, name: thread.user.fullName },
      isPinned: thread.isPinned,
      createdAt: thread.createdAt,
      replies: replies.map(toReplyDto),
    };
  }

  async deleteThread(
    user: RequestUser,
    threadId: string,
  ): Promise<{ success: true }> {
    const thread = await this.threadRepository.findOne({
      where: { id: threadId },
    });
    if (!thread) {
      throw new ThreadNotFoundException();
    }
    if (thread.userId !== user.userId && !user.isAdmin) {
      throw new ThreadDeleteForbiddenException();
    }

    await this.threadRepository.delete({ id: thread.id });
    this.logger.log(`Thread ${thread.id} deleted by user ${user.userId}`);
    return { success: true };
  }

  async createReply(
    user: RequestUser,
    threadId: string,
    dto: CreateReplyDto,
  ): Promise<ReplyDto> {
    const thread = await this.threadRepository.findOne({
      where: { id: threadId },
    });
    if (!thread) {
      throw new ThreadNotFoundException();
    }

    let parent: ForumReply | null = null;
    if (dto.parentId) {
      parent = await this.replyRepository.findOne({
        where: { id: dto.parentId, threadId },
      });
      if (!parent) {
        throw new ReplyNotFoundException();
      }
    }
    const answersPersona = parent?.personaId != null;

    const { reply, job } = await this.dataSource.transaction(
      async (manager): Promise<{ reply: ForumReply; job: Job }> => {
        const replies = manager.getRepository(ForumReply);
        const reply = await replies.save(
          replies.create({
            threadId,
            userId: user.userId,
            personaId: null,
            parentId: parent?.id ?? null,
            content: dto.content,
            status: GenerationStatus.COMPLETED,
          }),
        );
        await manager.update(ForumThread, { id: threadId }, {
          updatedAt: new Date(),
        });

        const job = answersPersona
          ? await this.jobSubmitter.createJob(
              JobType.FORUM_DIRECT_REPLY,
              { threadId, parentReplyId: reply.id },
              null,
              manager,
            )
          : await this.jobSubmitter.createJob(
              JobType.FORUM_SCHEDULE_BUMP,
              { threadId },
              null,
              manager,
            );

        return { reply, job };
      },
    );

    await this.jobSubmitter.dispatch(job);

    const stored = await this.replyRepository.findOne({
      where: { id: reply.id },
      relations: { user: true, persona: true },
    });
    return toReplyDto(stored ?? reply);
  }

  async getReplyStatus(replyId: string): Promise<ReplyStatusDto> {
    const reply = await this.replyRepository.findOne({
      where: { id: replyId },
      select: ['id', 'status', 'content'],
    });
    if (!reply) {
      throw new ReplyNotFoundException();
    }
    return { id: reply.id, status: reply.status, content: reply.content };
  }

  // ── Helpers ────────────────────────────────────────────────

  private async findThread(threadId: string): Promise<ForumThread> {
    const thread = await this.threadRepository.findOne({
      where: { id: threadId },
      relations: { user: true },
    });
    if (!thread) {
      throw new ThreadNotFoundException();
    }
    return thread;
  }

  private async replyStats(
    threadIds: string[],
  ): Promise<Map<string, ReplyStatsRow>> {
    if (threadIds.length === 0) {
      return new Map();
    }

    const rows = await this.replyRepository
      .createQueryBuilder('reply')
      .select('reply.thread_id', 'threadId')
      .addSelect('COUNT(*)', 'replyCount')
      .addSelect('MAX(reply.created_at)', 'lastReplyAt')
      .where({ threadId: In(threadIds) })
      .groupBy('reply.thread_id')
      .getRawMany<ReplyStatsRow>();

    return new Map(rows.map((row) => [row.threadId, row]));
  }

  private toListItem(
    thread: ForumThread,
    replyCount: number,
    lastReplyAt: Date | null,
  ): ThreadListItemDto {
    const lastActivityAt =
      lastReplyAt && lastReplyAt > thread.updatedAt
        ? lastReplyAt
        : thread.updatedAt;

    return {
      id: thread.id,
      title: thread.title,
      author: { id: thread.user.id, name: thread.user.fullName },
      isPinned: thread.isPinned,
      replyCount,
      createdAt: thread.createdAt,
      lastActivityAt,
    };
  }
}
