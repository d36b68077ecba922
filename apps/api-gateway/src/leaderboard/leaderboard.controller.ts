import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { JwtAuthGuard, PremiumGuard } from '../auth';
import { LeaderboardService } from './leaderboard.service';
import { LeaderboardQueryDto } from './dto/leaderboard.dto';
import type { LeaderboardDto } from './dto/leaderboard.dto';

@Controller('api/leaderboard')
@UseGuards(JwtAuthGuard, PremiumGuard)
export class LeaderboardController {
  constructor(private readonly leaderboardService: LeaderboardService) {}

  @Get()
  get(@Query() query: LeaderboardQueryDto): Promise<LeaderboardDto> {
    return this.leaderboardService.getLeaderboard(query.limit);
  }
}
