import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { ForumAgentSchedule, Job, JobType } from '@hairline/database';
import { JobSubmitter } from '@hairline/queue';
import { ForumSchedulerService } from './forum-scheduler.service';

describe('ForumSchedulerService', () => {
  let service: ForumSchedulerService;

  const now = new Date('2026-05-01T12:00:00.000Z');
  const dueAt = new Date('2026-05-01T11:59:00.000Z');

  const scheduleRepository = { find: jest.fn() };
  const manager = { update: jest.fn() };
  const dataSource = {
    transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    ),
  };
  const jobSubmitter = { createJob: jest.fn(), dispatch: jest.fn() };

  function schedule(id: string): ForumAgentSchedule {
    return Object.assign(new ForumAgentSchedule(), {
      id,
      threadId: 't1',
      personaId: `persona-${id}`,
      nextReplyAt: dueAt,
      replyCount: 1,
      isActive: true,
    });
  }

  beforeEach(async () => {
    jest.clearAllMocks();

    const moduleRef = await Test.createTestingModule({
      providers: [
        ForumSchedulerService,
        {
          provide: getRepositoryToken(ForumAgentSchedule),
          useValue: scheduleRepository,
        },
        { provide: DataSource, useValue: dataSource },
        { provide: JobSubmitter, useValue: jobSubmitter },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((_key: string, fallback: unknown) => fallback) },
        },
      ],
    }).compile();

    service = moduleRef.get(ForumSchedulerService);
    jobSubmitter.createJob.mockImplementation(
      (type: JobType, payload: { scheduleId: string }) =>
        Promise.resolve(
          Object.assign(new Job(), { id: `job-${payload.scheduleId}`, type }),
        ),
    );
  });

  it('clears each due schedule and creates its reply job', async () => {
    scheduleRepository.find.mockResolvedValue([schedule('s1'), schedule('s2')]);
    manager.update.mockResolvedValue({ affected: 1 });

    const created = await service.tick(now);

    expect(created).toBe(2);
    expect(manager.update).toHaveBeenCalledWith(
      ForumAgentSchedule,
      { id: 's1', nextReplyAt: dueAt },
      { nextReplyAt: null },
    );
    expect(jobSubmitter.createJob).toHaveBeenCalledWith(
      JobType.FORUM_AGENT_REPLY,
      { scheduleId: 's1' },
      null,
      manager,
    );
    expect(jobSubmitter.dispatch).toHaveBeenCalledTimes(2);
  });

  it('skips a schedule another tick already claimed', async () => {
    scheduleRepository.find.mockResolvedValue([schedule('s1')]);
    manager.update.mockResolvedValue({ affected: 0 });

    const created = await service.tick(now);

    expect(created).toBe(0);
    expect(jobSubmitter.createJob).not.toHaveBeenCalled();
    expect(jobSubmitter.dispatch).not.toHaveBeenCalled();
  });
});
