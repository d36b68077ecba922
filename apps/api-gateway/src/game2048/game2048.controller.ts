import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { Game2048Service } from './game2048.service';
import { SubmitScoreDto } from './dto/game2048.dto';
import type { HighScoreDto, ScoreDto } from './dto/game2048.dto';

@Controller('api/2048')
@UseGuards(JwtAuthGuard)
export class Game2048Controller {
  constructor(private readonly game2048Service: Game2048Service) {}

  @Post('scores')
  submit(
    @CurrentUser() user: RequestUser,
    @Body() dto: SubmitScoreDto,
  ): Promise<ScoreDto> {
    return this.game2048Service.submit(user.userId, dto);
  }

  @Get('high-score')
  highScore(@CurrentUser() user: RequestUser): Promise<HighScoreDto | null> {
    return this.game2048Service.getHighScore(user.userId);
  }
}
