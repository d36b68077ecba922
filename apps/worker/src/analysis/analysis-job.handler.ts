import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Analysis, Job, JobType, User } from '@hairline/database';
import {
  AnalysisPayload,
  JobError,
  JobValidationError,
  analysisPayloadSchema,
} from '@hairline/queue';
import { JobHandler, JobResult } from '../jobs/job-handler';
import { StructuredLlmService } from '../llm/structured-llm.service';
import { norwoodAnalysisSchema } from '../llm/llm.schemas';
import { ANALYSIS_INSTRUCTION, NORWOOD_ANALYSIS_PROMPT } from '../llm/prompts';
import { ImageProcessorService } from '../images/image-processor.service';

/** Single-photo Norwood classification. */
@Injectable()
export class AnalysisJobHandler extends JobHandler<AnalysisPayload> {
  readonly type = JobType.ANALYSIS;
  protected readonly payloadSchema = analysisPayloadSchema;
  private readonly logger = new Logger(AnalysisJobHandler.name);

  constructor(
    @InjectRepository(Analysis)
    private readonly analysisRepository: Repository<Analysis>,
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly imageProcessor: ImageProcessorService,
    private readonly llm: StructuredLlmService,
  ) {
    super();
  }

  protected async handle(
    payload: AnalysisPayload,
    job: Job,
  ): Promise<JobResult> {
    if (!job.userId) {
      throw new JobValidationError('Analysis job has no owner');
    }

    const image = await this.imageProcessor.loadForModel(payload.imageKey);
    const result = await this.llm.generateStructured({
      systemPrompt: NORWOOD_ANALYSIS_PROMPT,
      userText: ANALYSIS_INSTRUCTION,
      images: [image],
      schema: norwoodAnalysisSchema,
      toolName: 'norwood_analysis',
      toolDescription: 'Record the Norwood classification of the photo',
    });

    const analysis = await this.analysisRepository.save(
      this.analysisRepository.create({
        userId: job.userId,
        imageKey: payload.imageKey,
        ...result,
      }),
    );

    this.logger.log(
      `Analysis ${analysis.id} for user ${job.userId}: stage ${result.norwoodStage} (${result.confidence})`,
    );

    return { analysisId: analysis.id, ...result };
  }

  /** Gives a free user back the analysis the failed job consumed. */
  protected async onFailed(
    _payload: AnalysisPayload,
    job: Job,
    _error: JobError,
  ): Promise<void> {
    if (!job.userId) {
      return;
    }

    const outcome = await this.userRepository.increment(
      { id: job.userId, isPremium: false },
      'freeAnalysesRemaining',
      1,
    );

    if (outcome.affected) {
      this.logger.log(`Refunded free analysis to user ${job.userId}`);
    }
  }
}
