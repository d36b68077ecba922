import { Readable } from 'stream';
import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { StorageService } from './storage.service';
import { StorageReadException } from './storage.exceptions';

const mockMinioClient = {
  bucketExists: jest.fn(),
  makeBucket: jest.fn(),
  putObject: jest.fn(),
  getObject: jest.fn(),
  removeObject: jest.fn(),
  presignedGetObject: jest.fn(),
};

jest.mock('minio', () => ({
  Client: jest.fn().mockImplementation(() => mockMinioClient),
}));

describe('StorageService', () => {
  let service: StorageService;

  beforeEach(async () => {
    jest.clearAllMocks();
    mockMinioClient.bucketExists.mockResolvedValue(true);

    const moduleRef = await Test.createTestingModule({
      providers: [
        StorageService,
        {
          provide: ConfigService,
          useValue: { get: (_key: string, fallback: unknown) => fallback },
        },
      ],
    }).compile();

    service = moduleRef.get(StorageService);
    await service.onModuleInit();
  });

  it('creates the bucket when it is missing', async () => {
    mockMinioClient.bucketExists.mockResolvedValueOnce(false);

    await service.onModuleInit();

    expect(mockMinioClient.makeBucket).toHaveBeenCalledWith(
      'hairline-uploads',
      'us-east-1',
    );
  });

  it('uploads under a prefixed, sanitized key', async () => {
    const body = Buffer.from('jpeg-bytes');

    const key = await service.uploadFile(
      body,
      'My Selfie.JPG',
      'image/jpeg',
      'analyses',
    );

    expect(key).toMatch(/^analyses\/\d{4}\/[0-9a-f-]{36}-my_selfie\.jpg$/);
    expect(mockMinioClient.putObject).toHaveBeenCalledWith(
      'hairline-uploads',
      key,
      body,
      body.length,
      { 'Content-Type': 'image/jpeg' },
    );
  });

  it('reads an object into a single buffer', async () => {
    mockMinioClient.getObject.mockResolvedValueOnce(
      Readable.from([Buffer.from('ab'), Buffer.from('c')]),
    );

    const data = await service.getObject('analyses/2026/x.jpg');

    expect(data.toString()).toBe('abc');
  });

  it('wraps read failures in StorageReadException', async () => {
    mockMinioClient.getObject.mockRejectedValueOnce(new Error('NoSuchKey'));

    await expect(service.getObject('missing.jpg')).rejects.toBeInstanceOf(
      StorageReadException,
    );
  });

  it('removes objects best-effort and skips empty keys', async () => {
    mockMinioClient.removeObject
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce(undefined);

    await expect(
      service.removeObjects(['a.jpg', null, 'b.jpg']),
    ).resolves.toBeUndefined();

    expect(mockMinioClient.removeObject).toHaveBeenCalledTimes(2);
    expect(mockMinioClient.removeObject).toHaveBeenLastCalledWith(
      'hairline-uploads',
      'b.jpg',
    );
  });
});
