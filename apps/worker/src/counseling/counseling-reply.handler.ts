import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import {
  Analysis,
  CounselingMessage,
  CounselingRole,
  CounselingSession,
  GenerationStatus,
  Job,
  JobType,
} from '@hairline/database';
import {
  CounselingReplyPayload,
  JobError,
  JobNotFoundError,
  counselingReplyPayloadSchema,
} from '@hairline/queue';
import { JobHandler, JobResult } from '../jobs/job-handler';
import { StructuredLlmService } from '../llm/structured-llm.service';
import { ConversationTurn } from '../llm/llm.types';
import { counselingSystemPrompt } from '../llm/prompts';

const TITLE_WORDS = 5;
const ANALYSIS_CONTEXT_SIZE = 10;

/** First five words of the opening message, with "..." when cut short. */
export function sessionTitle(firstMessage: string): string {
  const words = firstMessage.trim().split(/\s+/).filter(Boolean);
  const title = words.slice(0, TITLE_WORDS).join(' ');
  return words.length > TITLE_WORDS ? `${title}...` : title;
}

/** Generates the assistant turn of a counseling session. */
@Injectable()
export class CounselingReplyHandler extends JobHandler<CounselingReplyPayload> {
  readonly type = JobType.COUNSELING_REPLY;
  protected readonly payloadSchema = counselingReplyPayloadSchema;
  private readonly logger = new Logger(CounselingReplyHandler.name);

  constructor(
    @InjectRepository(CounselingMessage)
    private readonly messageRepository: Repository<CounselingMessage>,
    @InjectRepository(CounselingSession)
    private readonly sessionRepository: Repository<CounselingSession>,
    @InjectRepository(Analysis)
    private readonly analysisRepository: Repository<Analysis>,
    private readonly llm: StructuredLlmService,
  ) {
    super();
  }

  protected async handle({
    messageId,
  }: CounselingReplyPayload): Promise<JobResult> {
    const message = await this.messageRepository.findOne({
      where: { id: messageId },
      relations: { session: true },
    });

    if (!message) {
      throw new JobNotFoundError('Counseling message', messageId);
    }

    const { session } = message;

    if (message.status === GenerationStatus.COMPLETED) {
      return { messageId, sessionId: session.id, content: message.content };
    }

    await this.messageRepository.update(message.id, {
      status: GenerationStatus.PROCESSING,
    });

    const history = await this.messageRepository.find({
      where: { sessionId: session.id, status: GenerationStatus.COMPLETED },
      order: { createdAt: 'ASC' },
    });
    const turns = history.flatMap((turn): ConversationTurn[] =>
      turn.content
        ? [
            {
              role: turn.role === CounselingRole.USER ? 'user' : 'assistant',
              content: turn.content,
            },
          ]
        : [],
    );

    const analyses = await this.analysisRepository.find({
      where: { userId: session.userId },
      order: { createdAt: 'DESC' },
      take: ANALYSIS_CONTEXT_SIZE,
    });

    const content = await this.llm.generateText({
      systemPrompt: counselingSystemPrompt(analyses.map((a) => a.norwoodStage)),
      messages: turns,
    });

    await this.messageRepository.update(message.id, {
      content,
      status: GenerationStatus.COMPLETED,
    });

    if (!session.title) {
      const opening = history.find(
        (turn) => turn.role === CounselingRole.USER && turn.content,
      );
      if (opening?.content) {
        await this.sessionRepository.update(session.id, {
          title: sessionTitle(opening.content),
        });
      }
    }

    this.logger.log(`Counseling reply ready for session ${session.id}`);

    return { messageId, sessionId: session.id, content };
  }

  protected async onFailed(
    { messageId }: CounselingReplyPayload,
    _job: Job,
    _error: JobError,
  ): Promise<void> {
    await this.messageRepository.update(
      {
        id: messageId,
        status: In([GenerationStatus.PENDING, GenerationStatus.PROCESSING]),
      },
      { status: GenerationStatus.FAILED },
    );
  }
}
