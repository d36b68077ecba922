import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import type { InsecurityEntry, NorwoodEntry } from '../leaderboard.rules';

export class LeaderboardQueryDto {
  /** Overrides the per-board default sizes. */
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(50)
  limit?: number;
}

export interface LeaderboardDto {
  bestNorwood: NorwoodEntry[];
  worstNorwood: NorwoodEntry[];
  insecurityIndex: InsecurityEntry[];
}
