import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import {
  Analysis,
  AnalysisConfidence,
  Job,
  JobStatus,
  JobType,
  User,
} from '@hairline/database';
import { JobValidationError, UpstreamError } from '@hairline/queue';
import { AnalysisJobHandler } from './analysis-job.handler';
import { StructuredLlmService } from '../llm/structured-llm.service';
import { ImageProcessorService } from '../images/image-processor.service';

describe('AnalysisJobHandler', () => {
  let handler: AnalysisJobHandler;

  const analysisRepository = {
    create: jest.fn((data: Partial<Analysis>) => ({ ...data })),
    save: jest.fn((analysis: Partial<Analysis>) =>
      Promise.resolve({ ...analysis, id: 'an1' }),
    ),
  };
  const userRepository = { increment: jest.fn() };
  const imageProcessor = { loadForModel: jest.fn() };
  const llm = { generateStructured: jest.fn() };

  const classification = {
    norwoodStage: 3,
    confidence: AnalysisConfidence.HIGH,
    title: 'Early recession',
    description: 'Temples have receded.',
    analysisText: 'Clear M shape.',
    reasoning: 'Recession past stage 2.',
  };

  function analysisJob(overrides: Partial<Job> = {}): Job {
    return Object.assign(new Job(), {
      id: 'j1',
      type: JobType.ANALYSIS,
      userId: 'u1',
      status: JobStatus.STARTED,
      attempts: 1,
      payload: { imageKey: 'analyses/2026/x-photo.png', mediaType: 'image/png' },
      ...overrides,
    });
  }

  beforeEach(async () => {
    jest.clearAllMocks();

    const moduleRef = await Test.createTestingModule({
      providers: [
        AnalysisJobHandler,
        { provide: getRepositoryToken(Analysis), useValue: analysisRepository },
        { provide: getRepositoryToken(User), useValue: userRepository },
        { provide: ImageProcessorService, useValue: imageProcessor },
        { provide: StructuredLlmService, useValue: llm },
      ],
    }).compile();

    handler = moduleRef.get(AnalysisJobHandler);
    imageProcessor.loadForModel.mockResolvedValue({
      data: Buffer.from('jpeg'),
      mediaType: 'image/jpeg',
    });
  });

  it('stores the classification and returns it with the analysis id', async () => {
    llm.generateStructured.mockResolvedValue(classification);

    const result = await handler.run(analysisJob());

    expect(imageProcessor.loadForModel).toHaveBeenCalledWith('analyses/2026/x-photo.png');
    expect(llm.generateStructured).toHaveBeenCalledWith(
      expect.objectContaining({ toolName: 'norwood_analysis' }),
    );
    expect(analysisRepository.create).toHaveBeenCalledWith({
      userId: 'u1',
      imageKey: 'analyses/2026/x-photo.png',
      ...classification,
    });
    expect(result).toEqual({ analysisId: 'an1', ...classification });
  });

  it('rejects a payload without an image key', async () => {
    await expect(
      handler.run(analysisJob({ payload: { mediaType: 'image/png' } })),
    ).rejects.toThrow(JobValidationError);
    expect(llm.generateStructured).not.toHaveBeenCalled();
  });

  it('lets upstream errors through for the runner to retry', async () => {
    llm.generateStructured.mockRejectedValue(new UpstreamError('timeout'));

    await expect(handler.run(analysisJob())).rejects.toThrow(UpstreamError);
    expect(analysisRepository.save).not.toHaveBeenCalled();
  });

  it('refunds the free analysis of a non-premium owner on failure', async () => {
    userRepository.increment.mockResolvedValue({ affected: 1 });

    await handler.fail(analysisJob(), new UpstreamError('timeout'));

    expect(userRepository.increment).toHaveBeenCalledWith(
      { id: 'u1', isPremium: false },
      'freeAnalysesRemaining',
      1,
    );
  });
});
