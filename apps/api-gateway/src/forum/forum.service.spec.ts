import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource, In } from 'typeorm';
import {
  ForumPersona,
  ForumReply,
  ForumThread,
  GenerationStatus,
  Job,
  JobStatus,
  JobType,
  User,
} from '@hairline/database';
import { JobSubmitter } from '@hairline/queue';
import type { RequestUser } from '../auth';
import { ForumService } from './forum.service';
import {
  ReplyNotFoundException,
  ThreadDeleteForbiddenException,
  ThreadNotFoundException,
} from './forum.exceptions';

describe('ForumService', () => {
  let service: ForumService;

  const replies = { create: jest.fn((data: object) => data), save: jest.fn() };
  const manager = {
    getRepository: jest.fn(() => replies),
    update: jest.fn(),
  };
  const dataSource = {
    transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    ),
  };
  const queryBuilder = {
    select: jest.fn(),
    addSelect: jest.fn(),
    where: jest.fn(),
    groupBy: jest.fn(),
    getRawMany: jest.fn(),
  };
  const threadRepository = {
    findAndCount: jest.fn(),
    findOne: jest.fn(),
    create: jest.fn((data: object) => data),
    save: jest.fn(),
    delete: jest.fn(),
  };
  const replyRepository = {
    find: jest.fn(),
    findOne: jest.fn(),
    createQueryBuilder: jest.fn(() => queryBuilder),
  };
  const jobSubmitter = {
    submit: jest.fn(),
    createJob: jest.fn(),
    dispatch: jest.fn(),
  };

  const sam: RequestUser = {
    userId: 'u1',
    email: 'sam@example.com',
    isPremium: false,
    isAdmin: false,
  };
  const author = Object.assign(new User(), { id: 'u1', fullName: 'Sam Reed' });

  function thread(overrides: Partial<ForumThread> = {}): ForumThread {
    return Object.assign(new ForumThread(), {
      id: 't1',
      userId: 'u1',
      title: 'Finasteride at 22?',
      content: 'Has anyone started this young?',
      isPinned: false,
      createdAt: new Date('2026-03-01T10:00:00Z'),
      updatedAt: new Date('2026-03-01T10:00:00Z'),
      user: author,
      ...overrides,
    });
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    for (const step of ['select', 'addSelect', 'where', 'groupBy'] as const) {
      queryBuilder[step].mockReturnValue(queryBuilder);
    }

    const moduleRef = await Test.createTestingModule({
      providers: [
        ForumService,
        { provide: DataSource, useValue: dataSource },
        { provide: getRepositoryToken(ForumThread), useValue: threadRepository },
        { provide: getRepositoryToken(ForumReply), useValue: replyRepository },
        { provide: JobSubmitter, useValue: jobSubmitter },
      ],
    }).compile();

    service = moduleRef.get(ForumService);
    jobSubmitter.dispatch.mockResolvedValue(true);
  });

  describe('listThreads', () => {
    it('pages pinned threads first and attaches reply stats', async () => {
      const quiet = thread({ id: 't2' });
      const busy = thread();
      threadRepository.findAndCount.mockResolvedValue([[busy, quiet], 7]);
      const lastReply = new Date('2026-03-02T08:00:00Z');
      queryBuilder.getRawMany.mockResolvedValue([
        { threadId: 't1', replyCount: '4', lastReplyAt: lastReply },
      ]);

      const result = await service.listThreads(2, 5);

      expect(threadRepository.findAndCount).toHaveBeenCalledWith({
        relations: { user: true },
        order: { isPinned: 'DESC', updatedAt: 'DESC' },
        skip: 5,
        take: 5,
      });
      expect(queryBuilder.where).toHaveBeenCalledWith({
        threadId: In(['t1', 't2']),
      });
      expect(result.total).toBe(7);
      expect(result.page).toBe(2);
      expect(result.threads[0]).toMatchObject({
        id: 't1',
        replyCount: 4,
        lastActivityAt: lastReply,
        author: { id: 'u1', name: 'Sam Reed' },
      });
      expect(result.threads[1]).toMatchObject({
        id: 't2',
        replyCount: 0,
        lastActivityAt: quiet.updatedAt,
      });
    });

    it('skips the stats query for an empty page', async () => {
      threadRepository.findAndCount.mockResolvedValue([[], 0]);

      const result = await service.listThreads(1, 20);

      expect(result.threads).toEqual([]);
      expect(replyRepository.createQueryBuilder).not.toHaveBeenCalled();
    });
  });

  it('creates a thread and queues its persona schedules', async () => {
    threadRepository.save.mockResolvedValue(thread());
    threadRepository.findOne.mockResolvedValue(thread());

    const created = await service.createThread(sam, {
      title: 'Finasteride at 22?',
      content: 'Has anyone started this young?',
    });

    expect(threadRepository.create).toHaveBeenCalledWith({
      userId: 'u1',
      title: 'Finasteride at 22?',
      content: 'Has anyone started this young?',
      isPinned: false,
    });
    expect(jobSubmitter.submit).toHaveBeenCalledWith(
      JobType.FORUM_SCHEDULE_INIT,
      { threadId: 't1' },
      null,
    );
    expect(created).toMatchObject({ id: 't1', replyCount: 0 });
  });

  it('returns replies with their persona or user author', async () => {
    threadRepository.findOne.mockResolvedValue(thread());
    const persona = Object.assign(new ForumPersona(), { id: 'p1', name: 'Baldwin' });
    replyRepository.find.mockResolvedValue([
      Object.assign(new ForumReply(), {
        id: 'r1',
        content: 'Started at 21, no regrets.',
        status: GenerationStatus.COMPLETED,
        user: null,
        persona,
        parentId: null,
        createdAt: new Date('2026-03-01T10:05:00Z'),
      }),
    ]);

    const detail = await service.getThread('t1');

    expect(replyRepository.find).toHaveBeenCalledWith({
      where: { threadId: 't1' },
      relations: { user: true, persona: true },
      order: { createdAt: 'ASC' },
    });
    expect(detail.replies).toEqual([
      {
        id: 'r1',
        content: 'Started at 21, no regrets.',
        status: GenerationStatus.COMPLETED,
        author: null,
        persona: { id: 'p1', name: 'Baldwin' },
        parentId: null,
        createdAt: new Date('2026-03-01T10:05:00Z'),
      },
    ]);
  });

  describe('deleteThread', () => {
    it('lets an admin delete another user\'s thread', async () => {
      threadRepository.findOne.mockResolvedValue(thread({ userId: 'u2' }));

      await service.deleteThread({ ...sam, isAdmin: true }, 't1');

      expect(threadRepository.delete).toHaveBeenCalledWith({ id: 't1' });
    });

    it('forbids other users', async () => {
      threadRepository.findOne.mockResolvedValue(thread({ userId: 'u2' }));

      await expect(service.deleteThread(sam, 't1')).rejects.toBeInstanceOf(
        ThreadDeleteForbiddenException,
      );
      expect(threadRepository.delete).not.toHaveBeenCalled();
    });

    it('reports a missing thread', async () => {
      threadRepository.findOne.mockResolvedValue(null);

      await expect(service.deleteThread(sam, 'nope')).rejects.toBeInstanceOf(
        ThreadNotFoundException,
      );
    });
  });

  describe('createReply', () => {
    const savedReply = Object.assign(new ForumReply(), {
      id: 'r9',
      threadId: 't1',
      userId: 'u1',
      personaId: null,
      content: 'Thanks all',
      status: GenerationStatus.COMPLETED,
      user: author,
      persona: null,
      createdAt: new Date('2026-03-03T09:00:00Z'),
    });
    const job = Object.assign(new Job(), { id: 'j1', status: JobStatus.PENDING });

    beforeEach(() => {
      threadRepository.findOne.mockResolvedValue(thread());
      replies.save.mockResolvedValue(savedReply);
      jobSubmitter.createJob.mockResolvedValue(job);
    });

    it('bumps the schedules for a top-level reply', async () => {
      replyRepository.findOne.mockResolvedValue({ ...savedReply, parentId: null });

      const reply = await service.createReply(sam, 't1', { content: 'Thanks all' });

      expect(replies.create).toHaveBeenCalledWith({
        threadId: 't1',
        userId: 'u1',
        personaId: null,
        parentId: null,
        content: 'Thanks all',
        status: GenerationStatus.COMPLETED,
      });
      expect(manager.update).toHaveBeenCalledWith(
        ForumThread,
        { id: 't1' },
        { updatedAt: expect.any(Date) },
      );
      expect(jobSubmitter.createJob).toHaveBeenCalledWith(
        JobType.FORUM_SCHEDULE_BUMP,
        { threadId: 't1' },
        null,
        manager,
      );
      expect(jobSubmitter.dispatch).toHaveBeenCalledWith(job);
      expect(reply).toMatchObject({
        id: 'r9',
        author: { id: 'u1', name: 'Sam Reed' },
        persona: null,
      });
    });

    it('asks for a direct answer when replying to a persona', async () => {
      replyRepository.findOne
        .mockResolvedValueOnce(
          Object.assign(new ForumReply(), { id: 'r5', threadId: 't1', personaId: 'p1' }),
        )
        .mockResolvedValueOnce({ ...savedReply, parentId: 'r5' });

      await service.createReply(sam, 't1', { content: 'What dose?', parentId: 'r5' });

      expect(replyRepository.findOne).toHaveBeenNthCalledWith(1, {
        where: { id: 'r5', threadId: 't1' },
      });
      expect(replies.create).toHaveBeenCalledWith(
        expect.objectContaining({ parentId: 'r5' }),
      );
      expect(jobSubmitter.createJob).toHaveBeenCalledWith(
        JobType.FORUM_DIRECT_REPLY,
        { threadId: 't1', parentReplyId: 'r9' },
        null,
        manager,
      );
    });

    it('bumps when replying to another user', async () => {
      replyRepository.findOne
        .mockResolvedValueOnce(
          Object.assign(new ForumReply(), { id: 'r4', threadId: 't1', personaId: null }),
        )
        .mockResolvedValueOnce(savedReply);

      await service.createReply(sam, 't1', { content: 'Same here', parentId: 'r4' });

      expect(jobSubmitter.createJob).toHaveBeenCalledWith(
        JobType.FORUM_SCHEDULE_BUMP,
        { threadId: 't1' },
        null,
        manager,
      );
    });

    it('rejects a parent from another thread', async () => {
      replyRepository.findOne.mockResolvedValueOnce(null);

      await expect(
        service.createReply(sam, 't1', { content: 'Hi', parentId: 'elsewhere' }),
      ).rejects.toBeInstanceOf(ReplyNotFoundException);
      expect(dataSource.transaction).not.toHaveBeenCalled();
    });
  });

  it('reports a reply\'s generation status', async () => {
    replyRepository.findOne.mockResolvedValue(
      Object.assign(new ForumReply(), {
        id: 'r3',
        status: GenerationStatus.PROCESSING,
        content: null,
      }),
    );

    await expect(service.getReplyStatus('r3')).resolves.toEqual({
      id: 'r3',
      status: GenerationStatus.PROCESSING,
      content: null,
    });
  });
});
