import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import {
  Certification,
  CertificationPhoto,
  CertificationStatus,
  Job,
  JobType,
  NON_TERMINAL_CERTIFICATION_STATUSES,
  PHOTO_SLOTS,
  PhotoValidationStatus,
} from '@hairline/database';
import {
  CertificationDiagnosisPayload,
  JobError,
  JobNotFoundError,
  JobValidationError,
  UpstreamError,
  certificationDiagnosisPayloadSchema,
} from '@hairline/queue';
import { StorageService } from '@hairline/storage';
import { JobHandler, JobResult } from '../jobs/job-handler';
import { StructuredLlmService } from '../llm/structured-llm.service';
import {
  CertificationDiagnosis,
  certificationDiagnosisSchema,
} from '../llm/llm.schemas';
import {
  CERTIFICATION_DIAGNOSIS_INSTRUCTION,
  CERTIFICATION_DIAGNOSIS_PROMPT,
} from '../llm/prompts';
import { ImageProcessorService } from '../images/image-processor.service';
import { CertificateRendererService } from './certificate-renderer.service';

export function certificatePdfKey(certificationId: string): string {
  return `certificates/${certificationId}.pdf`;
}

/** The diagnosis a previous attempt already persisted, if complete. */
export function storedDiagnosis(
  certification: Certification,
): CertificationDiagnosis | null {
  const {
    norwoodStage,
    norwoodVariant,
    confidence,
    clinicalAssessment,
    observableFeatures,
    differentialConsiderations,
  } = certification;

  if (
    norwoodStage === null ||
    confidence === null ||
    clinicalAssessment === null ||
    differentialConsiderations === null
  ) {
    return null;
  }

  return {
    norwoodStage,
    norwoodVariant,
    confidence,
    clinicalAssessment,
    observableFeatures: observableFeatures ?? [],
    differentialConsiderations,
  };
}

/**
 * Issues the certificate for a certification in ANALYZING.
 *
 * Steps, each safe to repeat:
 *   1. diagnosis: LLM over the three approved photos, persisted at once;
 *      skipped when a previous attempt already stored one
 *   2. document: PDF rendered and written to a key derived from the id
 *   3. complete: pdfKey, certifiedAt and COMPLETED in one UPDATE
 *
 * A terminal failure moves the certification to FAILED.
 */
@Injectable()
export class CertificationDiagnosisHandler extends JobHandler<CertificationDiagnosisPayload> {
  readonly type = JobType.CERTIFICATION_DIAGNOSIS;
  protected readonly payloadSchema = certificationDiagnosisPayloadSchema;
  private readonly logger = new Logger(CertificationDiagnosisHandler.name);

  constructor(
    @InjectRepository(Certification)
    private readonly certificationRepository: Repository<Certification>,
    private readonly imageProcessor: ImageProcessorService,
    private readonly llm: StructuredLlmService,
    private readonly renderer: CertificateRendererService,
    private readonly storageService: StorageService,
  ) {
    super();
  }

  protected async handle({
    certificationId,
  }: CertificationDiagnosisPayload): Promise<JobResult> {
    const certification = await this.certificationRepository.findOne({
      where: { id: certificationId },
      relations: { photos: true, user: true },
    });

    if (!certification) {
      throw new JobNotFoundError('Certification', certificationId);
    }

    if (certification.status !== CertificationStatus.ANALYZING) {
      throw new JobValidationError(
        `Certification ${certificationId} is ${certification.status}, expected ${CertificationStatus.ANALYZING}`,
      );
    }

    // ── Step 1: Diagnosis ──────────────────────────────────
    let diagnosis = storedDiagnosis(certification);
    if (diagnosis) {
      this.logger.log(
        `Certification ${certificationId} resumes with its stored diagnosis`,
      );
    } else {
      diagnosis = await this.diagnose(certification);
    }

    // ── Step 2: Certificate ────────────────────────────────
    const certifiedAt = new Date();
    const pdf = await this.renderer.render({
      certificationId,
      holderName: certification.user.fullName,
      norwoodStage: diagnosis.norwoodStage,
      norwoodVariant: diagnosis.norwoodVariant,
      confidence: diagnosis.confidence,
      clinicalAssessment: diagnosis.clinicalAssessment,
      certifiedAt,
    });

    const pdfKey = certificatePdfKey(certificationId);
    try {
      await this.storageService.putObject(pdfKey, pdf, 'application/pdf');
    } catch (error) {
      throw new UpstreamError(`Could not store certificate ${pdfKey}`, {
        cause: error,
      });
    }

    // ── Step 3: Complete ───────────────────────────────────
    const outcome = await this.certificationRepository.update(
      { id: certificationId, status: CertificationStatus.ANALYZING },
      { status: CertificationStatus.COMPLETED, pdfKey, certifiedAt },
    );

    if (!outcome.affected) {
      throw new JobValidationError(
        `Certification ${certificationId} left ${CertificationStatus.ANALYZING} before completion`,
      );
    }

    this.logger.log(
      `Certification ${certificationId} completed: stage ${diagnosis.norwoodStage}${diagnosis.norwoodVariant ?? ''}`,
    );

    return {
      certificationId,
      norwoodStage: diagnosis.norwoodStage,
      norwoodVariant: diagnosis.norwoodVariant,
      confidence: diagnosis.confidence,
      pdfKey,
    };
  }

  protected async onFailed(
    { certificationId }: CertificationDiagnosisPayload,
    _job: Job,
    error: JobError,
  ): Promise<void> {
    const outcome = await this.certificationRepository.update(
      {
        id: certificationId,
        status: In([...NON_TERMINAL_CERTIFICATION_STATUSES]),
      },
      { status: CertificationStatus.FAILED },
    );

    if (outcome.affected) {
      this.logger.warn(
        `Certification ${certificationId} marked failed: ${error.message}`,
      );
    }
  }

  private async diagnose(
    certification: Certification,
  ): Promise<CertificationDiagnosis> {
    const photos: CertificationPhoto[] = [];
    const missing: string[] = [];

    for (const slot of PHOTO_SLOTS) {
      const photo = certification.photos.find(
        (candidate) =>
          candidate.slot === slot &&
          candidate.validationStatus === PhotoValidationStatus.APPROVED,
      );
      if (photo) {
        photos.push(photo);
      } else {
        missing.push(slot);
      }
    }

    if (missing.length > 0) {
      throw new JobValidationError(
        `Missing approved photos: ${missing.join(', ')}`,
      );
    }

    const images = await Promise.all(
      photos.map((photo) => this.imageProcessor.loadForModel(photo.imageKey)),
    );

    const diagnosis = await this.llm.generateStructured({
      systemPrompt: CERTIFICATION_DIAGNOSIS_PROMPT,
      userText: CERTIFICATION_DIAGNOSIS_INSTRUCTION,
      images,
      schema: certificationDiagnosisSchema,
      toolName: 'certification_diagnosis',
      toolDescription: 'Record the formal Norwood classification',
    });

    await this.certificationRepository.update(
      { id: certification.id, status: CertificationStatus.ANALYZING },
      diagnosis,
    );

    return diagnosis;
  }
}
