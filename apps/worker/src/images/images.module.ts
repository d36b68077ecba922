import { Module } from '@nestjs/common';
import { StorageModule } from '@hairline/storage';
import { ImageProcessorService } from './image-processor.service';

@Module({
  imports: [StorageModule],
  providers: [ImageProcessorService],
  exports: [ImageProcessorService],
})
export class ImagesModule {}
