import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import {
  Certification,
  CertificationPhoto,
  CertificationStatus,
  Job,
  JobType,
  NorwoodVariant,
  PhotoSlot,
  PhotoValidationStatus,
  User,
} from '@hairline/database';
import {
  JobValidationError,
  UpstreamError,
} from '@hairline/queue';
import { StorageService } from '@hairline/storage';
import {
  CertificationDiagnosisHandler,
  storedDiagnosis,
} from './certification-diagnosis.handler';
import { CertificateRendererService } from './certificate-renderer.service';
import { StructuredLlmService } from '../llm/structured-llm.service';
import { ImageProcessorService } from '../images/image-processor.service';

const diagnosis = {
  norwoodStage: 4,
  norwoodVariant: NorwoodVariant.ANTERIOR,
  confidence: 0.81,
  clinicalAssessment: 'Advanced frontal recession.',
  observableFeatures: ['deep temples', 'thin forelock'],
  differentialConsiderations: 'Stage 3A considered.',
};

function approvedPhoto(slot: PhotoSlot): CertificationPhoto {
  return Object.assign(new CertificationPhoto(), {
    id: `photo-${slot}`,
    slot,
    imageKey: `certifications/2026/${slot}.jpg`,
    validationStatus: PhotoValidationStatus.APPROVED,
  });
}

function certification(overrides: Partial<Certification> = {}): Certification {
  return Object.assign(new Certification(), {
    id: 'c1',
    userId: 'u1',
    status: CertificationStatus.ANALYZING,
    norwoodStage: null,
    norwoodVariant: null,
    confidence: null,
    clinicalAssessment: null,
    observableFeatures: null,
    differentialConsiderations: null,
    pdfKey: null,
    certifiedAt: null,
    user: Object.assign(new User(), { id: 'u1', fullName: 'Test Holder' }),
    photos: [
      approvedPhoto(PhotoSlot.FRONT),
      approvedPhoto(PhotoSlot.LEFT),
      approvedPhoto(PhotoSlot.RIGHT),
    ],
    ...overrides,
  });
}

describe('storedDiagnosis', () => {
  it('is null until the diagnosis fields are written', () => {
    expect(storedDiagnosis(certification())).toBeNull();
  });

  it('returns the persisted diagnosis', () => {
    expect(storedDiagnosis(certification(diagnosis))).toEqual(diagnosis);
  });
});

describe('CertificationDiagnosisHandler', () => {
  let handler: CertificationDiagnosisHandler;

  const certificationRepository = { findOne: jest.fn(), update: jest.fn() };
  const imageProcessor = { loadForModel: jest.fn() };
  const llm = { generateStructured: jest.fn() };
  const renderer = { render: jest.fn() };
  const storageService = { putObject: jest.fn() };

  const job = Object.assign(new Job(), {
    id: 'j1',
    type: JobType.CERTIFICATION_DIAGNOSIS,
    userId: 'u1',
    attempts: 1,
    payload: { certificationId: 'c1' },
  });

  beforeEach(async () => {
    jest.clearAllMocks();

    const moduleRef = await Test.createTestingModule({
      providers: [
        CertificationDiagnosisHandler,
        {
          provide: getRepositoryToken(Certification),
          useValue: certificationRepository,
        },
        { provide: ImageProcessorService, useValue: imageProcessor },
        { provide: StructuredLlmService, useValue: llm },
        { provide: CertificateRendererService, useValue: renderer },
        { provide: StorageService, useValue: storageService },
      ],
    }).compile();

    handler = moduleRef.get(CertificationDiagnosisHandler);
    imageProcessor.loadForModel.mockImplementation((key: string) =>
      Promise.resolve({ data: Buffer.from(key), mediaType: 'image/jpeg' }),
    );
    renderer.render.mockResolvedValue(Buffer.from('%PDF-1.3'));
    storageService.putObject.mockResolvedValue(undefined);
    certificationRepository.update.mockResolvedValue({ affected: 1 });
  });

  it('diagnoses, stores the certificate and completes', async () => {
    certificationRepository.findOne.mockResolvedValue(certification());
    llm.generateStructured.mockResolvedValue(diagnosis);

    const result = await handler.run(job);

    expect(imageProcessor.loadForModel.mock.calls.map((call) => call[0])).toEqual([
      'certifications/2026/front.jpg',
      'certifications/2026/left.jpg',
      'certifications/2026/right.jpg',
    ]);
    expect(certificationRepository.update).toHaveBeenNthCalledWith(
      1,
      { id: 'c1', status: CertificationStatus.ANALYZING },
      diagnosis,
    );
    expect(renderer.render).toHaveBeenCalledWith(
      expect.objectContaining({ holderName: 'Test Holder', norwoodStage: 4 }),
    );
    expect(storageService.putObject).toHaveBeenCalledWith(
      'certificates/c1.pdf',
      Buffer.from('%PDF-1.3'),
      'application/pdf',
    );
    expect(certificationRepository.update).toHaveBeenNthCalledWith(
      2,
      { id: 'c1', status: CertificationStatus.ANALYZING },
      expect.objectContaining({
        status: CertificationStatus.COMPLETED,
        pdfKey: 'certificates/c1.pdf',
      }),
    );
    expect(result).toEqual({
      certificationId: 'c1',
      norwoodStage: 4,
      norwoodVariant: NorwoodVariant.ANTERIOR,
      confidence: 0.81,
      pdfKey: 'certificates/c1.pdf',
    });
  });

  it('resumes from a stored diagnosis without calling the model', async () => {
    certificationRepository.findOne.mockResolvedValue(certification(diagnosis));

    await handler.run(job);

    expect(llm.generateStructured).not.toHaveBeenCalled();
    expect(imageProcessor.loadForModel).not.toHaveBeenCalled();
    expect(certificationRepository.update).toHaveBeenCalledTimes(1);
    expect(storageService.putObject).toHaveBeenCalled();
  });

  it('refuses a certification that is not analyzing', async () => {
    certificationRepository.findOne.mockResolvedValue(
      certification({ status: CertificationStatus.PHOTOS_PENDING }),
    );

    await expect(handler.run(job)).rejects.toThrow(JobValidationError);
  });

  it('names the slots that are not approved', async () => {
    certificationRepository.findOne.mockResolvedValue(
      certification({ photos: [approvedPhoto(PhotoSlot.LEFT)] }),
    );

    await expect(handler.run(job)).rejects.toThrow(
      'Missing approved photos: front, right',
    );
  });

  it('retries when the certificate cannot be stored', async () => {
    certificationRepository.findOne.mockResolvedValue(certification(diagnosis));
    storageService.putObject.mockRejectedValue(new Error('S3 unavailable'));

    await expect(handler.run(job)).rejects.toThrow(UpstreamError);
    expect(certificationRepository.update).not.toHaveBeenCalled();
  });

  it('fails a non-terminal certification when the job fails for good', async () => {
    await handler.fail(job, new UpstreamError('model down'));

    expect(certificationRepository.update).toHaveBeenCalledWith(
      expect.objectContaining({ id: 'c1' }),
      { status: CertificationStatus.FAILED },
    );
  });
});
