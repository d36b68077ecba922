import { IsBoolean, IsInt, IsOptional, Min } from 'class-validator';

export class SubmitScoreDto {
  @IsInt()
  @Min(0)
  score!: number;

  /** Must also be a power of two; checked by the service. */
  @IsInt()
  @Min(2)
  highestTile!: number;

  @IsOptional()
  @IsBoolean()
  isWin: boolean = false;
}

export interface ScoreDto {
  id: string;
  score: number;
  highestTile: number;
  isWin: boolean;
  isHighScore: boolean;
}

export interface HighScoreDto {
  score: number;
  highestTile: number;
}
