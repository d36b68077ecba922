import {
  Controller,
  Delete,
  Get,
  Param,
  Query,
  UseGuards,
} from '@nestjs/common';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { AnalysesService } from './analyses.service';
import { AnalysisDto } from './dto/analysis-response.dto';
import { ListAnalysesQueryDto } from './dto/list-analyses-query.dto';

@Controller('api/analyses')
@UseGuards(JwtAuthGuard)
export class AnalysesController {
  constructor(private readonly analysesService: AnalysesService) {}

  /** Newest first. */
  @Get()
  list(
    @CurrentUser() user: RequestUser,
    @Query() query: ListAnalysesQueryDto,
  ): Promise<AnalysisDto[]> {
    return this.analysesService.list(user.userId, query.limit);
  }

  @Get(':id')
  get(
    @CurrentUser() user: RequestUser,
    @Param('id') analysisId: string,
  ): Promise<AnalysisDto> {
    return this.analysesService.get(user.userId, analysisId);
  }

  @Delete(':id')
  remove(
    @CurrentUser() user: RequestUser,
    @Param('id') analysisId: string,
  ): Promise<{ success: true }> {
    return this.analysesService.remove(user.userId, analysisId);
  }
}
