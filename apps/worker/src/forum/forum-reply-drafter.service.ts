import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, IsNull, Repository } from 'typeorm';
import {
  ForumPersona,
  ForumReply,
  ForumThread,
  GenerationStatus,
} from '@hairline/database';
import { StructuredLlmService } from '../llm/structured-llm.service';
import { forumReplyDraftSchema } from '../llm/llm.schemas';
import { FORUM_REPLY_INSTRUCTIONS } from '../llm/prompts';
import { REPLY_CONTEXT_SIZE } from './forum-schedule';

function authorName(reply: ForumReply): string {
  return reply.persona?.name ?? reply.user?.fullName ?? 'Member';
}

/** Plain-text view of a thread as the persona sees it. */
export function formatThreadTranscript(
  thread: ForumThread,
  recentReplies: readonly ForumReply[],
  respondingTo?: ForumReply,
): string {
  const lines = [
    `Thread: ${thread.title}`,
    `${thread.user?.fullName ?? 'Member'} wrote:`,
    thread.content,
  ];

  if (recentReplies.length > 0) {
    lines.push('', 'Recent replies, oldest first:');
    for (const reply of recentReplies) {
      lines.push(`[${authorName(reply)}] ${reply.content ?? ''}`);
    }
  }

  if (respondingTo) {
    lines.push(
      '',
      `Answer this message directly. [${authorName(respondingTo)}] ${respondingTo.content ?? ''}`,
    );
  }

  return lines.join('\n');
}

/**
 * ForumReplyDrafter: shared by the scheduled and the direct reply jobs.
 *
 * A job attempt first opens (or re-opens) a PROCESSING reply row, so a
 * retried attempt fills the row the failed attempt left behind instead of
 * adding a second one.
 */
@Injectable()
export class ForumReplyDrafter {
  constructor(
    @InjectRepository(ForumReply)
    private readonly replyRepository: Repository<ForumReply>,
    private readonly llm: StructuredLlmService,
  ) {}

  async openReply(
    threadId: string,
    personaId: string,
    parentId: string | null,
  ): Promise<ForumReply> {
    const existing = await this.replyRepository.findOne({
      where: {
        threadId,
        personaId,
        parentId: parentId ?? IsNull(),
        status: GenerationStatus.PROCESSING,
      },
    });

    if (existing) {
      return existing;
    }

    return this.replyRepository.save(
      this.replyRepository.create({
        threadId,
        personaId,
        parentId,
        userId: null,
        content: null,
        status: GenerationStatus.PROCESSING,
      }),
    );
  }

  async draft(
    persona: ForumPersona,
    thread: ForumThread,
    respondingTo?: ForumReply,
  ): Promise<string> {
    const latest = await this.replyRepository.find({
      where: { threadId: thread.id, status: GenerationStatus.COMPLETED },
      relations: { user: true, persona: true },
      order: { createdAt: 'DESC' },
      take: REPLY_CONTEXT_SIZE,
    });

    const { content } = await this.llm.generateStructured({
      systemPrompt: `${persona.systemPrompt}\n\n${FORUM_REPLY_INSTRUCTIONS}`,
      userText: formatThreadTranscript(thread, latest.reverse(), respondingTo),
      schema: forumReplyDraftSchema,
      toolName: 'forum_reply',
      toolDescription: 'Publish your forum post',
    });

    return content.trim();
  }

  /** Marks the PROCESSING rows an abandoned job left behind as failed. */
  async abandon(
    threadId: string,
    parentId: string | null,
    personaId?: string,
  ): Promise<void> {
    const where: FindOptionsWhere<ForumReply> = {
      threadId,
      parentId: parentId ?? IsNull(),
      status: GenerationStatus.PROCESSING,
    };
    if (personaId) {
      where.personaId = personaId;
    }

    await this.replyRepository.update(where, {
      status: GenerationStatus.FAILED,
    });
  }
}
