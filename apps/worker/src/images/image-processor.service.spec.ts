import { Test } from '@nestjs/testing';
import sharp from 'sharp';
import { StorageService } from '@hairline/storage';
import { JobValidationError, UpstreamError } from '@hairline/queue';
import { ImageProcessorService } from './image-processor.service';

function solidPng(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 120, g: 90, b: 60 } },
  })
    .png()
    .toBuffer();
}

describe('ImageProcessorService', () => {
  const storageService = { getObject: jest.fn() };
  let processor: ImageProcessorService;

  beforeEach(async () => {
    jest.clearAllMocks();

    const moduleRef = await Test.createTestingModule({
      providers: [
        ImageProcessorService,
        { provide: StorageService, useValue: storageService },
      ],
    }).compile();

    processor = moduleRef.get(ImageProcessorService);
  });

  it('scales large images down to the maximum edge as JPEG', async () => {
    const image = await processor.normalize(await solidPng(3000, 1000));
    const metadata = await sharp(image.data).metadata();

    expect(image.mediaType).toBe('image/jpeg');
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(1568);
    expect(metadata.height).toBeLessThan(1568);
  });

  it('never enlarges small images', async () => {
    const image = await processor.normalize(await solidPng(200, 100));
    const metadata = await sharp(image.data).metadata();

    expect(metadata.width).toBe(200);
    expect(metadata.height).toBe(100);
  });

  it('rejects bytes that are not an image', async () => {
    await expect(
      processor.normalize(Buffer.from('definitely not a photo')),
    ).rejects.toThrow(JobValidationError);
  });

  it('loads the object from storage before normalising', async () => {
    storageService.getObject.mockResolvedValue(await solidPng(10, 10));

    const image = await processor.loadForModel('analyses/2026/a.png');

    expect(storageService.getObject).toHaveBeenCalledWith('analyses/2026/a.png');
    expect(image.mediaType).toBe('image/jpeg');
  });

  it('reports storage read failures as retryable', async () => {
    storageService.getObject.mockRejectedValue(new Error('socket hang up'));

    const error = await processor
      .loadForModel('analyses/2026/a.png')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toHaveProperty('message', 'Could not read image analyses/2026/a.png');
  });
});
