import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseEnumPipe,
  Post,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { PhotoSlot } from '@hairline/database';
import { CurrentUser, JwtAuthGuard, PremiumGuard } from '../auth';
import type { RequestUser } from '../auth';
import { IMAGE_UPLOAD_OPTIONS } from '../uploads/upload-validator.service';
import { CertificationService } from './certification.service';
import {
  CertificationHistoryItemDto,
  CertificationStatusDto,
  CooldownDto,
  DiagnoseResponseDto,
  PhotoUploadedDto,
  PublicCertificationDto,
  StartCertificationDto,
} from './dto/certification-response.dto';

const slotPipe = new ParseEnumPipe(PhotoSlot);

/**
 * Premium-only certification routes under /api/certification.
 */
@Controller('api/certification')
@UseGuards(JwtAuthGuard, PremiumGuard)
export class CertificationController {
  constructor(private readonly certificationService: CertificationService) {}

  @Get('cooldown')
  cooldown(@CurrentUser() user: RequestUser): Promise<CooldownDto> {
    return this.certificationService.getCooldown(user);
  }

  @Get('history')
  history(
    @CurrentUser() user: RequestUser,
  ): Promise<CertificationHistoryItemDto[]> {
    return this.certificationService.history(user);
  }

  @Post('start')
  @HttpCode(HttpStatus.OK)
  start(@CurrentUser() user: RequestUser): Promise<StartCertificationDto> {
    return this.certificationService.start(user);
  }

  @Post(':id/photos/:slot')
  @UseInterceptors(FileInterceptor('file', IMAGE_UPLOAD_OPTIONS))
  @HttpCode(HttpStatus.ACCEPTED)
  uploadPhoto(
    @CurrentUser() user: RequestUser,
    @Param('id') certificationId: string,
    @Param('slot', slotPipe) slot: PhotoSlot,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<PhotoUploadedDto> {
    return this.certificationService.uploadPhoto(
      user,
      certificationId,
      slot,
      file,
    );
  }

  @Delete(':id/photos/:slot')
  deletePhoto(
    @CurrentUser() user: RequestUser,
    @Param('id') certificationId: string,
    @Param('slot', slotPipe) slot: PhotoSlot,
  ): Promise<{ success: true }> {
    return this.certificationService.deletePhoto(user, certificationId, slot);
  }

  @Get(':id/status')
  status(
    @CurrentUser() user: RequestUser,
    @Param('id') certificationId: string,
  ): Promise<CertificationStatusDto> {
    return this.certificationService.getStatus(user, certificationId);
  }

  @Post(':id/diagnose')
  @HttpCode(HttpStatus.ACCEPTED)
  diagnose(
    @CurrentUser() user: RequestUser,
    @Param('id') certificationId: string,
  ): Promise<DiagnoseResponseDto> {
    return this.certificationService.diagnose(user, certificationId);
  }

  @Get(':id/pdf')
  pdf(
    @CurrentUser() user: RequestUser,
    @Param('id') certificationId: string,
  ): Promise<{ pdfUrl: string }> {
    return this.certificationService.getPdfUrl(user, certificationId);
  }

  @Delete(':id')
  remove(
    @CurrentUser() user: RequestUser,
    @Param('id') certificationId: string,
  ): Promise<{ success: true }> {
    return this.certificationService.remove(user, certificationId);
  }
}

/** GET /api/certification/public/:id: no authentication. */
@Controller('api/certification/public')
export class PublicCertificationController {
  constructor(private readonly certificationService: CertificationService) {}

  @Get(':id')
  get(@Param('id') certificationId: string): Promise<PublicCertificationDto> {
    return this.certificationService.getPublic(certificationId);
  }
}
