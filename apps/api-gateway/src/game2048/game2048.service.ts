import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Game2048Score } from '@hairline/database';
import { HighScoreDto, ScoreDto, SubmitScoreDto } from './dto/game2048.dto';
import { InvalidTileException } from './game2048.exceptions';

export function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value >= 2 && (value & (value - 1)) === 0;
}

@Injectable()
export class Game2048Service {
  constructor(
    @InjectRepository(Game2048Score)
    private readonly scoreRepository: Repository<Game2048Score>,
  ) {}

  async submit(userId: string, dto: SubmitScoreDto): Promise<ScoreDto> {
    if (!isPowerOfTwo(dto.highestTile)) {
      throw new InvalidTileException(dto.highestTile);
    }

    const previousBest = await this.findBest(userId);
    const saved = await this.scoreRepository.save(
      this.scoreRepository.create({
        userId,
        score: dto.score,
        highestTile: dto.highestTile,
        isWin: dto.isWin,
      }),
    );

    return {
      id: saved.id,
      score: saved.score,
      highestTile: saved.highestTile,
      isWin: saved.isWin,
      isHighScore: !previousBest || saved.score > previousBest.score,
    };
  }

  async getHighScore(userId: string): Promise<HighScoreDto | null> {
    const best = await this.findBest(userId);
    return best ? { score: best.score, highestTile: best.highestTile } : null;
  }

  private findBest(userId: string): Promise<Game2048Score | null> {
    return this.scoreRepository.findOne({
      where: { userId },
      order: { score: 'DESC' },
    });
  }
}
