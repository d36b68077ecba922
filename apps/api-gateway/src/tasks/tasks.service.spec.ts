import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Job, JobErrorKind, JobStatus, JobType } from '@hairline/database';
import { TasksService } from './tasks.service';

describe('TasksService', () => {
  let service: TasksService;
  const jobRepository = { findOne: jest.fn() };

  function job(overrides: Partial<Job>): Job {
    return Object.assign(new Job(), {
      id: 'j1',
      type: JobType.ANALYSIS,
      userId: 'u1',
      status: JobStatus.PENDING,
      result: null,
      errorKind: null,
      errorMessage: null,
      ...overrides,
    });
  }

  beforeEach(async () => {
    jest.clearAllMocks();

    const moduleRef = await Test.createTestingModule({
      providers: [
        TasksService,
        { provide: getRepositoryToken(Job), useValue: jobRepository },
      ],
    }).compile();

    service = moduleRef.get(TasksService);
  });

  it('only looks up jobs owned by the caller', async () => {
    jobRepository.findOne.mockResolvedValue(null);

    await expect(service.getStatus('j1', 'u2')).rejects.toThrow(NotFoundException);
    expect(jobRepository.findOne).toHaveBeenCalledWith({
      where: { id: 'j1', userId: 'u2' },
    });
  });

  it('reports a running job as not ready', async () => {
    jobRepository.findOne.mockResolvedValue(job({ status: JobStatus.STARTED }));

    await expect(service.getStatus('j1', 'u1')).resolves.toEqual({
      taskId: 'j1',
      status: JobStatus.STARTED,
      ready: false,
      result: null,
      error: null,
      errorKind: null,
    });
  });

  it('returns the result of a completed job', async () => {
    jobRepository.findOne.mockResolvedValue(
      job({ status: JobStatus.COMPLETED, result: { analysisId: 'a1' } }),
    );

    const status = await service.getStatus('j1', 'u1');

    expect(status.ready).toBe(true);
    expect(status.result).toEqual({ analysisId: 'a1' });
    expect(status.error).toBeNull();
  });

  it('returns the error of a failed job', async () => {
    jobRepository.findOne.mockResolvedValue(
      job({
        status: JobStatus.FAILED,
        errorKind: JobErrorKind.UPSTREAM,
        errorMessage: 'LLM request failed: timeout',
      }),
    );

    const status = await service.getStatus('j1', 'u1');

    expect(status).toMatchObject({
      ready: true,
      result: null,
      error: 'LLM request failed: timeout',
      errorKind: JobErrorKind.UPSTREAM,
    });
  });
});
