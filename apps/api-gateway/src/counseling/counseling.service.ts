import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import {
  CounselingMessage,
  CounselingRole,
  CounselingSession,
  GenerationStatus,
  JobType,
} from '@hairline/database';
import { JobSubmitter } from '@hairline/queue';
import {
  MessageStatusDto,
  SendMessageDto,
  SentMessageDto,
  SessionDetailDto,
  SessionDto,
  toMessageDto,
} from './dto/counseling.dto';
import {
  MessageNotFoundException,
  SessionNotFoundException,
} from './counseling.exceptions';

/**
 * CounselingService: chat sessions whose assistant turns come from the
 * worker. Sending a message stores the user turn and an empty pending
 * assistant turn together with the counseling_reply job, so a client can
 * poll either the task or the message.
 */
@Injectable()
export class CounselingService {
  private readonly logger = new Logger(CounselingService.name);

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(CounselingSession)
    private readonly sessionRepository: Repository<CounselingSession>,
    @InjectRepository(CounselingMessage)
    private readonly messageRepository: Repository<CounselingMessage>,
    private readonly jobSubmitter: JobSubmitter,
  ) {}

  async listSessions(userId: string): Promise<SessionDto[]> {
    const sessions = await this.sessionRepository.find({
      where: { userId },
      order: { updatedAt: 'DESC' },
    });
    if (sessions.length === 0) {
      return [];
    }

    const counts = await this.messageRepository
      .createQueryBuilder('message')
      .select('message.session_id', 'sessionId')
      .addSelect('COUNT(*)', 'messageCount')
      .where({ sessionId: In(sessions.map((session) => session.id)) })
      .groupBy('message.session_id')
      .getRawMany<{ sessionId: string; messageCount: string }>();
    const countBySession = new Map(
      counts.map((row) => [row.sessionId, Number(row.messageCount)]),
    );

    return sessions.map((session) => ({
      id: session.id,
      title: session.title,
      createdAt: session.createdAt,
      messageCount: countBySession.get(session.id) ?? 0,
    }));
  }

  async createSession(userId: string): Promise<SessionDto> {
    const session = await this.sessionRepository.save(
      this.sessionRepository.create({ userId, title: null }),
    );

    return {
      id: session.id,
      title: session.title,
      createdAt: session.createdAt,
      messageCount: 0,
    };
  }

  async getSession(userId: string, sessionId: string): Promise<SessionDetailDto> {
    const session = await this.findOwned(userId, sessionId);
    // Both turns of an exchange share a transaction timestamp; ids break the tie.
    const messages = await this.messageRepository.find({
      where: { sessionId: session.id },
      order: { createdAt: 'ASC', id: 'ASC' },
    });

    return {
      id: session.id,
      title: session.title,
      createdAt: session.createdAt,
      messages: messages.map(toMessageDto),
    };
  }

  async sendMessage(
    userId: string,
    sessionId: string,
    dto: SendMessageDto,
  ): Promise<SentMessageDto> {
    const session = await this.findOwned(userId, sessionId);

    const { userMessage, assistantMessage, job } =
      await this.dataSource.transaction(async (manager) => {
        const messages = manager.getRepository(CounselingMessage);

        const userMessage = await messages.save(
          messages.create({
            sessionId: session.id,
            role: CounselingRole.USER,
            content: dto.content,
            status: GenerationStatus.COMPLETED,
          }),
        );
        const assistantMessage = await messages.save(
          messages.create({
            sessionId: session.id,
            role: CounselingRole.ASSISTANT,
            content: null,
            status: GenerationStatus.PENDING,
          }),
        );
        await manager.update(CounselingSession, { id: session.id }, {
          updatedAt: new Date(),
        });

        const job = await this.jobSubmitter.createJob(
          JobType.COUNSELING_REPLY,
          { messageId: assistantMessage.id },
          userId,
          manager,
        );

        return { userMessage, assistantMessage, job };
      });

    await this.jobSubmitter.dispatch(job);
    this.logger.log(`Counseling reply ${job.id} queued for session ${session.id}`);

    return {
      userMessage: toMessageDto(userMessage),
      assistantMessage: toMessageDto(assistantMessage),
      taskId: job.id,
    };
  }

  async getMessageStatus(
    userId: string,
    messageId: string,
  ): Promise<MessageStatusDto> {
    const message = await this.messageRepository.findOne({
      where: { id: messageId, session: { userId } },
      select: ['id', 'status', 'content'],
    });
    if (!message) {
      throw new MessageNotFoundException();
    }

    return { id: message.id, status: message.status, content: message.content };
  }

  async removeSession(
    userId: string,
    sessionId: string,
  ): Promise<{ success: true }> {
    const session = await this.findOwned(userId, sessionId);
    await this.sessionRepository.delete({ id: session.id });
    return { success: true };
  }

  private async findOwned(
    userId: string,
    sessionId: string,
  ): Promise<CounselingSession> {
    const session = await this.sessionRepository.findOne({
      where: { id: sessionId, userId },
    });
    if (!session) {
      throw new SessionNotFoundException();
    }
    return session;
  }
}
