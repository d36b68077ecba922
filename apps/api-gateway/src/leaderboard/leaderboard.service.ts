import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, MoreThan, ObjectLiteral, Repository } from 'typeorm';
import {
  Analysis,
  Certification,
  CertificationStatus,
  CounselingSession,
  User,
} from '@hairline/database';
import { LeaderboardDto } from './dto/leaderboard.dto';
import { rankByInsecurity, rankByNorwood } from './leaderboard.rules';

const NORWOOD_BOARD_SIZE = 5;
const INSECURITY_BOARD_SIZE = 10;
const ANONYMOUS = 'Anonymous';

@Injectable()
export class LeaderboardService {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    @InjectRepository(Analysis)
    private readonly analysisRepository: Repository<Analysis>,
    @InjectRepository(Certification)
    private readonly certificationRepository: Repository<Certification>,
    @InjectRepository(CounselingSession)
    private readonly sessionRepository: Repository<CounselingSession>,
  ) {}

  async getLeaderboard(limit?: number): Promise<LeaderboardDto> {
    const users = await this.userRepository.find({
      select: ['id', 'fullName', 'options'],
    });
    // Users opt out explicitly; a missing flag means visible.
    const visible = users.filter(
      (user) => user.options?.showOnLeaderboard !== false,
    );

    const [staged, certifications, analyses, sessions] = await Promise.all([
      this.analysisRepository.find({
        select: ['userId', 'norwoodStage'],
        where: { norwoodStage: MoreThan(0) },
      }),
      this.countByUser(this.certificationRepository, 'certification', {
        status: CertificationStatus.COMPLETED,
      }),
      this.countByUser(this.analysisRepository, 'analysis'),
      this.countByUser(this.sessionRepository, 'session'),
    ]);

    const stagesByUser = new Map<string, number[]>();
    for (const analysis of staged) {
      const stages = stagesByUser.get(analysis.userId) ?? [];
      stages.push(analysis.norwoodStage);
      stagesByUser.set(analysis.userId, stages);
    }

    const standings = visible.map((user) => ({
      username: user.fullName || ANONYMOUS,
      stages: stagesByUser.get(user.id) ?? [],
    }));
    const activity = visible.map((user) => ({
      username: user.fullName || ANONYMOUS,
      certifications: certifications.get(user.id) ?? 0,
      analyses: analyses.get(user.id) ?? 0,
      sessions: sessions.get(user.id) ?? 0,
    }));

    return {
      bestNorwood: rankByNorwood(standings, 'best', limit ?? NORWOOD_BOARD_SIZE),
      worstNorwood: rankByNorwood(standings, 'worst', limit ?? NORWOOD_BOARD_SIZE),
      insecurityIndex: rankByInsecurity(activity, limit ?? INSECURITY_BOARD_SIZE),
    };
  }

  private async countByUser<T extends ObjectLiteral>(
    repository: Repository<T>,
    alias: string,
    where?: FindOptionsWhere<T>,
  ): Promise<Map<string, number>> {
    const query = repository
      .createQueryBuilder(alias)
      .select(`${alias}.user_id`, 'userId')
      .addSelect('COUNT(*)', 'total')
      .groupBy(`${alias}.user_id`);
    if (where) {
      query.where(where);
    }

    const rows = await query.getRawMany<{ userId: string; total: string }>();
    return new Map(rows.map((row) => [row.userId, Number(row.total)]));
  }
}
