import {
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { IMAGE_UPLOAD_OPTIONS } from '../uploads/upload-validator.service';
import { AnalysesService } from './analyses.service';
import { AnalysisSubmittedDto } from './dto/analysis-response.dto';

/**
 * POST /analyze: multipart `file`, answers 202 with a task id to poll.
 *
 * Error responses:
 *   400 no file, 402 no free analyses left, 413 too large,
 *   415 unsupported type, 500 persistence, 502 storage
 */
@Controller('analyze')
export class AnalyzeController {
  private readonly logger = new Logger(AnalyzeController.name);

  constructor(private readonly analysesService: AnalysesService) {}

  @Post()
  @UseGuards(JwtAuthGuard)
  @UseInterceptors(FileInterceptor('file', IMAGE_UPLOAD_OPTIONS))
  @HttpCode(HttpStatus.ACCEPTED)
  analyze(
    @UploadedFile() file: Express.Multer.File | undefined,
    @CurrentUser() user: RequestUser,
  ): Promise<AnalysisSubmittedDto> {
    this.logger.log(
      `Analysis upload from user ${user.userId}: ` +
        `file="${file?.originalname ?? 'none'}", size=${file?.size ?? 0}`,
    );

    return this.analysesService.submit(user, file);
  }
}
