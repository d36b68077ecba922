import { HttpException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import {
  Certification,
  CertificationPhoto,
  CertificationStatus,
  Job,
  JobType,
  NON_TERMINAL_CERTIFICATION_STATUSES,
  PhotoSlot,
  PhotoValidationStatus,
  User,
} from '@hairline/database';
import { JobSubmitter } from '@hairline/queue';
import { StorageService } from '@hairline/storage';
import { UploadValidator } from '../uploads/upload-validator.service';
import type { RequestUser } from '../auth';
import {
  cooldownDaysRemaining,
  isAcceptingPhotos,
  missingApprovedSlots,
  sortBySlot,
} from './certification.rules';
import {
  CertificationCooldownException,
  CertificationNotFoundException,
  CertificationPersistenceException,
  DiagnosisNotAllowedException,
  MissingApprovedPhotosException,
  NotAcceptingPhotosException,
  PdfNotReadyException,
  PhotoAlreadyApprovedException,
  PhotoNotFoundException,
} from './certification.exceptions';
import {
  CertificationHistoryItemDto,
  CertificationStatusDto,
  CooldownDto,
  DiagnoseResponseDto,
  PhotoUploadedDto,
  PublicCertificationDto,
  StartCertificationDto,
} from './dto/certification-response.dto';

/**
 * CertificationService: the three-photo certification workflow.
 *
 * photos_pending ──diagnose──▶ analyzing ──worker──▶ completed
 *        │                          │
 *        └──────────────────────────┴──worker onFailed──▶ failed
 *
 * Writes that race each other (start, photo upload, diagnose) take a
 * row lock first: the user row for start, the certification row for the
 * rest.
 */
@Injectable()
export class CertificationService {
  private readonly logger = new Logger(CertificationService.name);
  private readonly cooldownDays: number;

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(Certification)
    private readonly certificationRepository: Repository<Certification>,
    @InjectRepository(CertificationPhoto)
    private readonly photoRepository: Repository<CertificationPhoto>,
    private readonly storageService: StorageService,
    private readonly jobSubmitter: JobSubmitter,
    private readonly uploadValidator: UploadValidator,
    configService: ConfigService,
  ) {
    this.cooldownDays = Number(
      configService.get<number>('CERTIFICATION_COOLDOWN_DAYS', 30),
    );
  }

  // ── Lifecycle ──────────────────────────────────────────────

  async getCooldown(user: RequestUser, now = new Date()): Promise<CooldownDto> {
    const lastCertifiedAt = await this.lastCertifiedAt(
      this.dataSource.manager,
      user.userId,
    );
    const daysRemaining = user.isAdmin
      ? 0
      : cooldownDaysRemaining(lastCertifiedAt, this.cooldownDays, now);

    return { onCooldown: daysRemaining > 0, daysRemaining, lastCertifiedAt };
  }

  /**
   * Returns the open certification, or starts one.
   *
   * @throws CertificationCooldownException (429) for non-admins inside
   *   the cooldown
   */
  async start(
    user: RequestUser,
    now = new Date(),
  ): Promise<StartCertificationDto> {
    const certification = await this.dataSource.transaction(async (manager) => {
      // Serialises concurrent starts for the same user
      await manager.findOne(User, {
        where: { id: user.userId },
        lock: { mode: 'pessimistic_write' },
      });

      const open = await manager.findOne(Certification, {
        where: {
          userId: user.userId,
          status: In([...NON_TERMINAL_CERTIFICATION_STATUSES]),
        },
      });
      if (open) {
        return open;
      }

      if (!user.isAdmin) {
        const daysRemaining = cooldownDaysRemaining(
          await this.lastCertifiedAt(manager, user.userId),
          this.cooldownDays,
          now,
        );
        if (daysRemaining > 0) {
          throw new CertificationCooldownException(daysRemaining);
        }
      }

      const created = await manager.save(
        manager.create(Certification, {
          userId: user.userId,
          status: CertificationStatus.PHOTOS_PENDING,
        }),
      );
      this.logger.log(
        `Certification ${created.id} started for user ${user.userId}`,
      );
      return created;
    });

    return { certificationId: certification.id, status: certification.status };
  }

  // ── Photos ─────────────────────────────────────────────────

  /**
   * Stores a photo in its slot and queues its validation.
   *
   * A pending or rejected photo in the slot is replaced; an approved one
   * answers 409.
   */
  async uploadPhoto(
    user: RequestUser,
    certificationId: string,
    slot: PhotoSlot,
    file: Express.Multer.File | undefined,
  ): Promise<PhotoUploadedDto> {
    this.uploadValidator.assertImage(file);

    const certification = await this.findOwned(user.userId, certificationId);
    this.assertSlotWritable(
      certification.status,
      await this.photoRepository.findOne({ where: { certificationId, slot } }),
      slot,
    );

    const mediaType = file.mimetype;
    const imageKey = await this.storageService.uploadFile(
      file.buffer,
      file.originalname,
      mediaType,
      `certifications/${certificationId}`,
    );

    let photo: CertificationPhoto;
    let job: Job;
    let replacedKey: string | null;
    try {
      ({ photo, job, replacedKey } = await this.dataSource.transaction(
        async (manager) => {
          const locked = await this.lockOwned(manager, user.userId, certificationId);
          const existing = await manager.findOne(CertificationPhoto, {
            where: { certificationId, slot },
          });
          this.assertSlotWritable(locked.status, existing, slot);
          const previousKey = existing?.imageKey ?? null;

          const saved = await manager.save(
            Object.assign(existing ?? manager.create(CertificationPhoto), {
              certificationId,
              slot,
              imageKey,
              mediaType,
              validationStatus: PhotoValidationStatus.PENDING,
              rejectionReason: null,
              qualityNotes: null,
            }),
          );

          const created = await this.jobSubmitter.createJob(
            JobType.PHOTO_VALIDATION,
            { photoId: saved.id, imageKey },
            user.userId,
            manager,
          );

          return {
            photo: saved,
            job: created,
            replacedKey: previousKey,
          };
        },
      ));
    } catch (error) {
      await this.storageService.removeObjects([imageKey]);
      throw this.toHttpError(error, `photo upload for ${certificationId}`);
    }

    await this.storageService.removeObjects([replacedKey]);
    await this.jobSubmitter.dispatch(job);

    this.logger.log(
      `Photo ${photo.id} (${slot}) uploaded to certification ${certificationId}`,
    );

    return { photoId: photo.id, taskId: job.id, slot };
  }

  /**
   * Explicit redo of a slot, approved photos included. Runs under the
   * certification lock so it cannot interleave with `diagnose`.
   */
  async deletePhoto(
    user: RequestUser,
    certificationId: string,
    slot: PhotoSlot,
  ): Promise<{ success: true }> {
    let removed: CertificationPhoto;
    try {
      removed = await this.dataSource.transaction(async (manager) => {
        const locked = await this.lockOwned(manager, user.userId, certificationId);
        if (!isAcceptingPhotos(locked.status)) {
          throw new NotAcceptingPhotosException();
        }

        const photo = await manager.findOne(CertificationPhoto, {
          where: { certificationId, slot },
        });
        if (!photo) {
          throw new PhotoNotFoundException(slot);
        }

        await manager.delete(CertificationPhoto, { id: photo.id });
        return photo;
      });
    } catch (error) {
      throw this.toHttpError(error, `photo delete for ${certificationId}`);
    }

    await this.storageService.removeObjects([removed.imageKey]);

    this.logger.log(`Photo ${removed.id} (${slot}) removed from ${certificationId}`);
    return { success: true };
  }

  // ── Diagnosis ──────────────────────────────────────────────

  /**
   * Moves the certification to analyzing and queues the diagnosis; both
   * commit together.
   */
  async diagnose(
    user: RequestUser,
    certificationId: string,
  ): Promise<DiagnoseResponseDto> {
    let job: Job;
    try {
      job = await this.dataSource.transaction(async (manager) => {
        const certification = await this.lockOwned(
          manager,
          user.userId,
          certificationId,
        );

        if (certification.status !== CertificationStatus.PHOTOS_PENDING) {
          throw new DiagnosisNotAllowedException();
        }

        const photos = await manager.find(CertificationPhoto, {
          where: { certificationId },
        });
        const missing = missingApprovedSlots(photos);
        if (missing.length > 0) {
          throw new MissingApprovedPhotosException(missing);
        }

        await manager.update(Certification, certificationId, {
          status: CertificationStatus.ANALYZING,
        });

        return this.jobSubmitter.createJob(
          JobType.CERTIFICATION_DIAGNOSIS,
          { certificationId },
          user.userId,
          manager,
        );
      });
    } catch (error) {
      throw this.toHttpError(error, `diagnosis of ${certificationId}`);
    }

    await this.jobSubmitter.dispatch(job);
    this.logger.log(`Certification ${certificationId} queued for diagnosis`);

    return { taskId: job.id };
  }

  // ── Reads ──────────────────────────────────────────────────

  async getStatus(
    user: RequestUser,
    certificationId: string,
  ): Promise<CertificationStatusDto> {
    const certification = await this.certificationRepository.findOne({
      where: { id: certificationId, userId: user.userId },
      relations: { photos: true },
    });

    if (!certification) {
      throw new CertificationNotFoundException();
    }

    const photos = await Promise.all(
      sortBySlot(certification.photos).map(async (photo) => ({
        photoId: photo.id,
        slot: photo.slot,
        validationStatus: photo.validationStatus,
        rejectionReason: photo.rejectionReason,
        qualityNotes: photo.qualityNotes,
        imageUrl: await this.storageService.getPresignedUrl(photo.imageKey),
      })),
    );
    const completed = certification.status === CertificationStatus.COMPLETED;

    return {
      certificationId: certification.id,
      status: certification.status,
      photos,
      norwoodStage: completed ? certification.norwoodStage : null,
      norwoodVariant: completed ? certification.norwoodVariant : null,
      confidence: completed ? certification.confidence : null,
      clinicalAssessment: completed ? certification.clinicalAssessment : null,
      observableFeatures: completed ? certification.observableFeatures : null,
      differentialConsiderations: completed
        ? certification.differentialConsiderations
        : null,
      pdfUrl: await this.presignedOrNull(certification.pdfKey),
      certifiedAt: certification.certifiedAt,
    };
  }

  async getPdfUrl(
    user: RequestUser,
    certificationId: string,
  ): Promise<{ pdfUrl: string }> {
    const certification = await this.findOwned(user.userId, certificationId);

    if (!certification.pdfKey) {
      throw new PdfNotReadyException();
    }

    return {
      pdfUrl: await this.storageService.getPresignedUrl(certification.pdfKey),
    };
  }

  /** Completed certifications, most recently certified first. */
  async history(user: RequestUser): Promise<CertificationHistoryItemDto[]> {
    const certifications = await this.certificationRepository.find({
      where: { userId: user.userId, status: CertificationStatus.COMPLETED },
      order: { certifiedAt: 'DESC' },
    });

    return Promise.all(
      certifications.map(async (certification) => ({
        id: certification.id,
        norwoodStage: certification.norwoodStage,
        norwoodVariant: certification.norwoodVariant,
        confidence: certification.confidence,
        certifiedAt: certification.certifiedAt,
        pdfUrl: await this.presignedOrNull(certification.pdfKey),
      })),
    );
  }

  /** Shareable view of a completed certification; no auth. */
  async getPublic(certificationId: string): Promise<PublicCertificationDto> {
    const certification = await this.certificationRepository.findOne({
      where: { id: certificationId, status: CertificationStatus.COMPLETED },
      relations: { user: true },
    });

    if (!certification) {
      throw new CertificationNotFoundException();
    }

    return {
      certificationId: certification.id,
      norwoodStage: certification.norwoodStage,
      norwoodVariant: certification.norwoodVariant,
      confidence: certification.confidence,
      certifiedAt: certification.certifiedAt,
      holderName: certification.user.fullName,
    };
  }

  async remove(
    user: RequestUser,
    certificationId: string,
  ): Promise<{ success: true }> {
    const certification = await this.certificationRepository.findOne({
      where: { id: certificationId, userId: user.userId },
      relations: { photos: true },
    });

    if (!certification) {
      throw new CertificationNotFoundException();
    }

    // Photos go with it through the foreign key cascade
    await this.certificationRepository.delete({ id: certification.id });
    await this.storageService.removeObjects([
      ...certification.photos.map((photo) => photo.imageKey),
      certification.pdfKey,
    ]);

    this.logger.log(`Certification ${certification.id} deleted`);
    return { success: true };
  }

  // ── Helpers ────────────────────────────────────────────────

  private async findOwned(
    userId: string,
    certificationId: string,
  ): Promise<Certification> {
    const certification = await this.certificationRepository.findOne({
      where: { id: certificationId, userId },
    });

    if (!certification) {
      throw new CertificationNotFoundException();
    }

    return certification;
  }

  private async lockOwned(
    manager: EntityManager,
    userId: string,
    certificationId: string,
  ): Promise<Certification> {
    const certification = await manager.findOne(Certification, {
      where: { id: certificationId, userId },
      lock: { mode: 'pessimistic_write' },
    });

    if (!certification) {
      throw new CertificationNotFoundException();
    }

    return certification;
  }

  private assertSlotWritable(
    status: CertificationStatus,
    existing: CertificationPhoto | null,
    slot: PhotoSlot,
  ): void {
    if (!isAcceptingPhotos(status)) {
      throw new NotAcceptingPhotosException();
    }

    if (existing?.validationStatus === PhotoValidationStatus.APPROVED) {
      throw new PhotoAlreadyApprovedException(slot);
    }
  }

  private async lastCertifiedAt(
    manager: EntityManager,
    userId: string,
  ): Promise<Date | null> {
    const last = await manager.findOne(Certification, {
      where: { userId, status: CertificationStatus.COMPLETED },
      order: { certifiedAt: 'DESC' },
    });

    return last?.certifiedAt ?? null;
  }

  private async presignedOrNull(objectKey: string | null): Promise<string | null> {
    return objectKey ? this.storageService.getPresignedUrl(objectKey) : null;
  }

  /** HTTP errors pass through; anything else is a 500. */
  private toHttpError(error: unknown, action: string): HttpException {
    if (error instanceof HttpException) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error(String(error));
    this.logger.error(`Failed to commit ${action}: ${cause.message}`);
    return new CertificationPersistenceException(cause);
  }
}
