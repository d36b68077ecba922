import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import {
  CertificationPhoto,
  Job,
  JobType,
  PhotoValidationStatus,
} from '@hairline/database';
import {
  JobError,
  JobNotFoundError,
  PhotoValidationPayload,
  photoValidationPayloadSchema,
} from '@hairline/queue';
import { JobHandler, JobResult } from '../jobs/job-handler';
import { StructuredLlmService } from '../llm/structured-llm.service';
import { photoValidationSchema } from '../llm/llm.schemas';
import {
  PHOTO_VALIDATION_PROMPT,
  photoValidationInstruction,
} from '../llm/prompts';
import { ImageProcessorService } from '../images/image-processor.service';

export const DEFAULT_REJECTION_REASON = 'Photo is not usable for assessment';
export const VALIDATION_FAILED_REASON = 'Photo could not be validated';

/**
 * Judges one certification photo for its slot.
 *
 * Verdict writes are conditioned on the photo still holding the upload
 * named in the payload and still being PENDING, so a re-upload while this
 * job runs is never overwritten by a verdict about the old image.
 */
@Injectable()
export class PhotoValidationHandler extends JobHandler<PhotoValidationPayload> {
  readonly type = JobType.PHOTO_VALIDATION;
  protected readonly payloadSchema = photoValidationPayloadSchema;
  private readonly logger = new Logger(PhotoValidationHandler.name);

  constructor(
    @InjectRepository(CertificationPhoto)
    private readonly photoRepository: Repository<CertificationPhoto>,
    private readonly imageProcessor: ImageProcessorService,
    private readonly llm: StructuredLlmService,
  ) {
    super();
  }

  protected async handle(payload: PhotoValidationPayload): Promise<JobResult> {
    const photo = await this.photoRepository.findOne({
      where: { id: payload.photoId },
    });

    if (!photo) {
      throw new JobNotFoundError('Certification photo', payload.photoId);
    }

    if (
      photo.imageKey !== payload.imageKey ||
      photo.validationStatus !== PhotoValidationStatus.PENDING
    ) {
      this.logger.debug(`Photo ${photo.id} was replaced or already judged`);
      return { photoId: photo.id, slot: photo.slot, superseded: true };
    }

    const image = await this.imageProcessor.loadForModel(photo.imageKey);
    const verdict = await this.llm.generateStructured({
      systemPrompt: PHOTO_VALIDATION_PROMPT,
      userText: photoValidationInstruction(photo.slot),
      images: [image],
      schema: photoValidationSchema,
      toolName: 'photo_validation',
      toolDescription: 'Record whether the photo is usable for its slot',
    });

    const rejectionReason = verdict.approved
      ? null
      : (verdict.rejectionReason ?? DEFAULT_REJECTION_REASON);

    const outcome = await this.photoRepository.update(
      {
        id: photo.id,
        imageKey: payload.imageKey,
        validationStatus: PhotoValidationStatus.PENDING,
      },
      {
        validationStatus: verdict.approved
          ? PhotoValidationStatus.APPROVED
          : PhotoValidationStatus.REJECTED,
        rejectionReason,
        qualityNotes: verdict.qualityNotes,
      },
    );

    if (!outcome.affected) {
      this.logger.debug(`Photo ${photo.id} changed during validation`);
      return { photoId: photo.id, slot: photo.slot, superseded: true };
    }

    this.logger.log(
      `Photo ${photo.id} (${photo.slot}) ${verdict.approved ? 'approved' : 'rejected'}`,
    );

    return {
      photoId: photo.id,
      slot: photo.slot,
      approved: verdict.approved,
      rejectionReason,
      qualityNotes: verdict.qualityNotes,
    };
  }

  /** Frees the slot for another upload. */
  protected async onFailed(
    payload: PhotoValidationPayload,
    _job: Job,
    _error: JobError,
  ): Promise<void> {
    await this.photoRepository.update(
      {
        id: payload.photoId,
        imageKey: payload.imageKey,
        validationStatus: PhotoValidationStatus.PENDING,
      },
      {
        validationStatus: PhotoValidationStatus.REJECTED,
        rejectionReason: VALIDATION_FAILED_REASON,
      },
    );
  }
}
