import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource, In } from 'typeorm';
import {
  Certification,
  CertificationPhoto,
  CertificationStatus,
  Job,
  JobType,
  PhotoSlot,
  PhotoValidationStatus,
  User,
} from '@hairline/database';
import { JobSubmitter } from '@hairline/queue';
import { StorageService } from '@hairline/storage';
import { UploadValidator } from '../uploads/upload-validator.service';
import type { RequestUser } from '../auth';
import { CertificationService } from './certification.service';
import {
  CertificationCooldownException,
  CertificationNotFoundException,
  DiagnosisNotAllowedException,
  NotAcceptingPhotosException,
  PhotoAlreadyApprovedException,
  PhotoNotFoundException,
} from './certification.exceptions';

describe('CertificationService', () => {
  let service: CertificationService;

  const manager = {
    findOne: jest.fn(),
    find: jest.fn(),
    update: jest.fn(),
    delete: jest.fn(),
    create: jest.fn((target: new () => object, data?: object) =>
      Object.assign(new target(), data),
    ),
    save: jest.fn(async (entity: { id?: string }) =>
      Object.assign(entity, { id: entity.id ?? 'generated-id' }),
    ),
  };
  const dataSource = {
    manager,
    transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    ),
  };
  const certificationRepository = {
    findOne: jest.fn(),
    find: jest.fn(),
    delete: jest.fn(),
  };
  const photoRepository = { findOne: jest.fn(), delete: jest.fn() };
  const storageService = {
    uploadFile: jest.fn(),
    removeObjects: jest.fn(),
    getPresignedUrl: jest.fn(),
  };
  const jobSubmitter = { createJob: jest.fn(), dispatch: jest.fn() };

  const member: RequestUser = {
    userId: 'u1',
    email: 'sam@example.com',
    isPremium: true,
    isAdmin: false,
  };
  const admin: RequestUser = { ...member, isAdmin: true };
  const now = new Date('2026-03-31T12:00:00Z');

  function certification(overrides: Partial<Certification> = {}): Certification {
    return Object.assign(new Certification(), {
      id: 'c1',
      userId: 'u1',
      status: CertificationStatus.PHOTOS_PENDING,
      pdfKey: null,
      certifiedAt: null,
      ...overrides,
    });
  }

  function photo(
    slot: PhotoSlot,
    validationStatus: PhotoValidationStatus,
    overrides: Partial<CertificationPhoto> = {},
  ): CertificationPhoto {
    return Object.assign(new CertificationPhoto(), {
      id: `p-${slot}`,
      certificationId: 'c1',
      slot,
      imageKey: `certifications/c1/2026/${slot}.jpg`,
      validationStatus,
      ...overrides,
    });
  }

  function upload(): Express.Multer.File {
    return {
      fieldname: 'file',
      originalname: 'front.png',
      encoding: '7bit',
      mimetype: 'image/png',
      size: 4096,
      buffer: Buffer.from('png-bytes'),
      destination: '',
      filename: '',
      path: '',
      stream: undefined as never,
    };
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    manager.findOne.mockReset();

    const moduleRef = await Test.createTestingModule({
      providers: [
        CertificationService,
        UploadValidator,
        { provide: DataSource, useValue: dataSource },
        {
          provide: getRepositoryToken(Certification),
          useValue: certificationRepository,
        },
        {
          provide: getRepositoryToken(CertificationPhoto),
          useValue: photoRepository,
        },
        { provide: StorageService, useValue: storageService },
        { provide: JobSubmitter, useValue: jobSubmitter },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((_key: string, fallback: unknown) => fallback) },
        },
      ],
    }).compile();

    service = moduleRef.get(CertificationService);
    jobSubmitter.dispatch.mockResolvedValue(true);
  });

  describe('start', () => {
    it('locks the user row and returns the open certification', async () => {
      const open = certification({ status: CertificationStatus.ANALYZING });
      manager.findOne.mockResolvedValueOnce(new User()).mockResolvedValueOnce(open);

      await expect(service.start(member, now)).resolves.toEqual({
        certificationId: 'c1',
        status: CertificationStatus.ANALYZING,
      });
      expect(manager.findOne).toHaveBeenNthCalledWith(1, User, {
        where: { id: 'u1' },
        lock: { mode: 'pessimistic_write' },
      });
      expect(manager.findOne).toHaveBeenNthCalledWith(2, Certification, {
        where: {
          userId: 'u1',
          status: In([
            CertificationStatus.PHOTOS_PENDING,
            CertificationStatus.ANALYZING,
          ]),
        },
      });
      expect(manager.save).not.toHaveBeenCalled();
    });

    it('answers 429 inside the cooldown', async () => {
      manager.findOne
        .mockResolvedValueOnce(new User())
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce(
          certification({
            status: CertificationStatus.COMPLETED,
            certifiedAt: new Date('2026-03-22T12:00:00Z'),
          }),
        );

      const error = await service.start(member, now).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CertificationCooldownException);
      expect(error).toHaveProperty(
        'message',
        'You can only certify once per month. 21 days remaining.',
      );
      expect(manager.save).not.toHaveBeenCalled();
    });

    it('lets admins start inside the cooldown', async () => {
      manager.findOne.mockResolvedValueOnce(new User()).mockResolvedValueOnce(null);

      await expect(service.start(admin, now)).resolves.toEqual({
        certificationId: 'generated-id',
        status: CertificationStatus.PHOTOS_PENDING,
      });
      expect(manager.findOne).toHaveBeenCalledTimes(2);
    });
  });

  describe('uploadPhoto', () => {
    it('replaces a rejected photo and queues its validation', async () => {
      const rejected = photo(PhotoSlot.FRONT, PhotoValidationStatus.REJECTED, {
        rejectionReason: 'Too dark',
      });
      certificationRepository.findOne.mockResolvedValue(certification());
      photoRepository.findOne.mockResolvedValue(rejected);
      storageService.uploadFile.mockResolvedValue('certifications/c1/2026/new.png');
      manager.findOne
        .mockResolvedValueOnce(certification())
        .mockResolvedValueOnce(rejected);
      jobSubmitter.createJob.mockResolvedValue(Object.assign(new Job(), { id: 'j9' }));

      const response = await service.uploadPhoto(member, 'c1', PhotoSlot.FRONT, upload());

      expect(response).toEqual({ photoId: 'p-front', taskId: 'j9', slot: PhotoSlot.FRONT });
      expect(manager.save).toHaveBeenCalledWith(
        expect.objectContaining({
          id: 'p-front',
          imageKey: 'certifications/c1/2026/new.png',
          mediaType: 'image/png',
          validationStatus: PhotoValidationStatus.PENDING,
          rejectionReason: null,
        }),
      );
      expect(jobSubmitter.createJob).toHaveBeenCalledWith(
        JobType.PHOTO_VALIDATION,
        { photoId: 'p-front', imageKey: 'certifications/c1/2026/new.png' },
        'u1',
        manager,
      );
      expect(storageService.removeObjects).toHaveBeenCalledWith([
        'certifications/c1/2026/front.jpg',
      ]);
      expect(jobSubmitter.dispatch).toHaveBeenCalled();
    });

    it('answers 409 for an approved slot', async () => {
      certificationRepository.findOne.mockResolvedValue(certification());
      photoRepository.findOne.mockResolvedValue(
        photo(PhotoSlot.LEFT, PhotoValidationStatus.APPROVED),
      );

      await expect(
        service.uploadPhoto(member, 'c1', PhotoSlot.LEFT, upload()),
      ).rejects.toThrow(PhotoAlreadyApprovedException);
      expect(storageService.uploadFile).not.toHaveBeenCalled();
    });

    it('answers 400 once diagnosis has started', async () => {
      certificationRepository.findOne.mockResolvedValue(
        certification({ status: CertificationStatus.ANALYZING }),
      );
      photoRepository.findOne.mockResolvedValue(null);

      await expect(
        service.uploadPhoto(member, 'c1', PhotoSlot.LEFT, upload()),
      ).rejects.toThrow(NotAcceptingPhotosException);
    });

    it('removes the new object when the slot was approved meanwhile', async () => {
      certificationRepository.findOne.mockResolvedValue(certification());
      photoRepository.findOne.mockResolvedValue(null);
      storageService.uploadFile.mockResolvedValue('certifications/c1/2026/late.png');
      manager.findOne
        .mockResolvedValueOnce(certification())
        .mockResolvedValueOnce(photo(PhotoSlot.RIGHT, PhotoValidationStatus.APPROVED));

      await expect(
        service.uploadPhoto(member, 'c1', PhotoSlot.RIGHT, upload()),
      ).rejects.toThrow(PhotoAlreadyApprovedException);
      expect(storageService.removeObjects).toHaveBeenCalledWith([
        'certifications/c1/2026/late.png',
      ]);
    });
  });

  describe('deletePhoto', () => {
    it('clears an approved slot so it can be uploaded again', async () => {
      const approved = photo(PhotoSlot.LEFT, PhotoValidationStatus.APPROVED);
      manager.findOne
        .mockResolvedValueOnce(certification())
        .mockResolvedValueOnce(approved);

      await expect(
        service.deletePhoto(member, 'c1', PhotoSlot.LEFT),
      ).resolves.toEqual({ success: true });
      expect(manager.delete).toHaveBeenCalledWith(CertificationPhoto, {
        id: 'p-left',
      });
      expect(storageService.removeObjects).toHaveBeenCalledWith([
        'certifications/c1/2026/left.jpg',
      ]);

      certificationRepository.findOne.mockResolvedValue(certification());
      photoRepository.findOne.mockResolvedValue(null);
      storageService.uploadFile.mockResolvedValue('certifications/c1/2026/redo.png');
      manager.findOne
        .mockResolvedValueOnce(certification())
        .mockResolvedValueOnce(null);
      jobSubmitter.createJob.mockResolvedValue(Object.assign(new Job(), { id: 'j10' }));

      const response = await service.uploadPhoto(member, 'c1', PhotoSlot.LEFT, upload());

      expect(response).toEqual({
        photoId: 'generated-id',
        taskId: 'j10',
        slot: PhotoSlot.LEFT,
      });
    });

    it('answers 404 for an empty slot', async () => {
      manager.findOne
        .mockResolvedValueOnce(certification())
        .mockResolvedValueOnce(null);

      await expect(
        service.deletePhoto(member, 'c1', PhotoSlot.RIGHT),
      ).rejects.toThrow(PhotoNotFoundException);
      expect(manager.delete).not.toHaveBeenCalled();
      expect(storageService.removeObjects).not.toHaveBeenCalled();
    });

    it('answers 400 once the locked certification left photos_pending', async () => {
      manager.findOne.mockResolvedValueOnce(
        certification({ status: CertificationStatus.ANALYZING }),
      );

      await expect(
        service.deletePhoto(member, 'c1', PhotoSlot.FRONT),
      ).rejects.toThrow(NotAcceptingPhotosException);
      expect(manager.findOne).toHaveBeenCalledWith(Certification, {
        where: { id: 'c1', userId: 'u1' },
        lock: { mode: 'pessimistic_write' },
      });
      expect(certificationRepository.findOne).not.toHaveBeenCalled();
      expect(manager.delete).not.toHaveBeenCalled();
      expect(storageService.removeObjects).not.toHaveBeenCalled();
    });
  });

  describe('diagnose', () => {
    it('names the slots still missing an approved photo', async () => {
      manager.findOne.mockResolvedValueOnce(certification());
      manager.find.mockResolvedValue([
        photo(PhotoSlot.FRONT, PhotoValidationStatus.APPROVED),
        photo(PhotoSlot.RIGHT, PhotoValidationStatus.PENDING),
      ]);

      await expect(service.diagnose(member, 'c1')).rejects.toThrow(
        'Missing approved photos: left, right',
      );
      expect(manager.update).not.toHaveBeenCalled();
    });

    it('flips to analyzing and queues the diagnosis together', async () => {
      manager.findOne.mockResolvedValueOnce(certification());
      manager.find.mockResolvedValue([
        photo(PhotoSlot.FRONT, PhotoValidationStatus.APPROVED),
        photo(PhotoSlot.LEFT, PhotoValidationStatus.APPROVED),
        photo(PhotoSlot.RIGHT, PhotoValidationStatus.APPROVED),
      ]);
      const job = Object.assign(new Job(), { id: 'j5' });
      jobSubmitter.createJob.mockResolvedValue(job);

      await expect(service.diagnose(member, 'c1')).resolves.toEqual({ taskId: 'j5' });
      expect(manager.update).toHaveBeenCalledWith(Certification, 'c1', {
        status: CertificationStatus.ANALYZING,
      });
      expect(jobSubmitter.createJob).toHaveBeenCalledWith(
        JobType.CERTIFICATION_DIAGNOSIS,
        { certificationId: 'c1' },
        'u1',
        manager,
      );
      expect(jobSubmitter.dispatch).toHaveBeenCalledWith(job);
    });

    it('refuses a certification that is already analyzing', async () => {
      manager.findOne.mockResolvedValueOnce(
        certification({ status: CertificationStatus.ANALYZING }),
      );

      await expect(service.diagnose(member, 'c1')).rejects.toThrow(
        DiagnosisNotAllowedException,
      );
    });
  });

  it('reports admins as never on cooldown', async () => {
    manager.findOne.mockResolvedValue(
      certification({
        status: CertificationStatus.COMPLETED,
        certifiedAt: new Date('2026-03-30T12:00:00Z'),
      }),
    );

    await expect(service.getCooldown(admin, now)).resolves.toEqual({
      onCooldown: false,
      daysRemaining: 0,
      lastCertifiedAt: new Date('2026-03-30T12:00:00Z'),
    });
    await expect(service.getCooldown(member, now)).resolves.toMatchObject({
      onCooldown: true,
      daysRemaining: 29,
    });
  });

  it('shows only completed certifications publicly', async () => {
    certificationRepository.findOne.mockResolvedValue(null);

    await expect(service.getPublic('c1')).rejects.toThrow(
      CertificationNotFoundException,
    );
    expect(certificationRepository.findOne).toHaveBeenCalledWith({
      where: { id: 'c1', status: CertificationStatus.COMPLETED },
      relations: { user: true },
    });
  });

  it('deletes a certification with its photos and certificate', async () => {
    certificationRepository.findOne.mockResolvedValue(
      Object.assign(certification({ pdfKey: 'certificates/c1.pdf' }), {
        photos: [photo(PhotoSlot.FRONT, PhotoValidationStatus.APPROVED)],
      }),
    );

    await expect(service.remove(member, 'c1')).resolves.toEqual({ success: true });
    expect(certificationRepository.delete).toHaveBeenCalledWith({ id: 'c1' });
    expect(storageService.removeObjects).toHaveBeenCalledWith([
      'certifications/c1/2026/front.jpg',
      'certificates/c1.pdf',
    ]);
  });
});
