import { HttpException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { Analysis, Job, JobType, User } from '@hairline/database';
import { JobSubmitter } from '@hairline/queue';
import { StorageService } from '@hairline/storage';
import { UploadValidator } from '../uploads/upload-validator.service';
import type { RequestUser } from '../auth';
import { AnalysisDto, AnalysisSubmittedDto } from './dto/analysis-response.dto';
import {
  AnalysisNotFoundException,
  AnalysisSubmissionException,
  NoAnalysesRemainingException,
} from './analyses.exceptions';

const DEFAULT_HISTORY_LIMIT = 20;

/**
 * AnalysesService: single-photo Norwood analysis.
 *
 * Submission flow:
 *   1. Validate the upload (415 / 413)
 *   2. Quota pre-check for free accounts (402), before anything is stored
 *   3. Upload the image to object storage
 *   4. One transaction: lock the user row, re-check and decrement the
 *      quota, create the analysis job
 *   5. Dispatch the job after commit
 *
 * If step 4 fails the uploaded object is removed again.
 */
@Injectable()
export class AnalysesService {
  private readonly logger = new Logger(AnalysesService.name);

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(Analysis)
    private readonly analysisRepository: Repository<Analysis>,
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly storageService: StorageService,
    private readonly jobSubmitter: JobSubmitter,
    private readonly uploadValidator: UploadValidator,
  ) {}

  async submit(
    user: RequestUser,
    file: Express.Multer.File | undefined,
  ): Promise<AnalysisSubmittedDto> {
    this.uploadValidator.assertImage(file);

    if (!user.isPremium) {
      const account = await this.userRepository.findOne({
        where: { id: user.userId },
        select: ['id', 'freeAnalysesRemaining'],
      });
      if (!account || account.freeAnalysesRemaining <= 0) {
        throw new NoAnalysesRemainingException();
      }
    }

    const mediaType = file.mimetype;
    const imageKey = await this.storageService.uploadFile(
      file.buffer,
      file.originalname,
      mediaType,
      'analyses',
    );

    let job: Job;
    try {
      job = await this.dataSource.transaction(async (manager) => {
        if (!user.isPremium) {
          const account = await manager.findOne(User, {
            where: { id: user.userId },
            lock: { mode: 'pessimistic_write' },
          });
          if (!account || account.freeAnalysesRemaining <= 0) {
            throw new NoAnalysesRemainingException();
          }
          await manager.decrement(
            User,
            { id: user.userId },
            'freeAnalysesRemaining',
            1,
          );
        }

        return this.jobSubmitter.createJob(
          JobType.ANALYSIS,
          { imageKey, mediaType },
          user.userId,
          manager,
        );
      });
    } catch (error) {
      await this.storageService.removeObjects([imageKey]);

      if (error instanceof HttpException) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Analysis submission failed for user ${user.userId}: ${cause.message}`,
      );
      throw new AnalysisSubmissionException(cause);
    }

    await this.jobSubmitter.dispatch(job);
    this.logger.log(`Analysis job ${job.id} queued for user ${user.userId}`);

    return { taskId: job.id, status: job.status };
  }

  async list(userId: string, limit?: number): Promise<AnalysisDto[]> {
    const analyses = await this.analysisRepository.find({
      where: { userId },
      order: { createdAt: 'DESC' },
      take: limit ?? DEFAULT_HISTORY_LIMIT,
    });

    return Promise.all(analyses.map((analysis) => this.toDto(analysis)));
  }

  async get(userId: string, analysisId: string): Promise<AnalysisDto> {
    return this.toDto(await this.findOwned(userId, analysisId));
  }

  async remove(userId: string, analysisId: string): Promise<{ success: true }> {
    const analysis = await this.findOwned(userId, analysisId);

    await this.analysisRepository.delete({ id: analysis.id });
    await this.storageService.removeObjects([analysis.imageKey]);

    this.logger.log(`Analysis ${analysis.id} deleted by user ${userId}`);
    return { success: true };
  }

  // ── Helpers ────────────────────────────────────────────────

  private async findOwned(userId: string, analysisId: string): Promise<Analysis> {
    const analysis = await this.analysisRepository.findOne({
      where: { id: analysisId, userId },
    });

    if (!analysis) {
      throw new AnalysisNotFoundException(analysisId);
    }

    return analysis;
  }

  private async toDto(analysis: Analysis): Promise<AnalysisDto> {
    const imageUrl = analysis.imageKey
      ? await this.storageService.getPresignedUrl(analysis.imageKey)
      : null;

    return AnalysisDto.fromEntity(analysis, imageUrl);
  }
}
