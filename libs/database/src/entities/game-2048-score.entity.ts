import { Entity, Column, CreateDateColumn, Index } from 'typeorm';
import { UlidEntity } from './ulid.entity';

@Entity('game_2048_scores')
@Index('IDX_game_2048_scores_user_score', ['userId', 'score'])
export class Game2048Score extends UlidEntity {
  @Column({ type: 'varchar', length: 26, name: 'user_id' })
  userId!: string;

  @Column({ type: 'integer' })
  score!: number;

  @Column({ type: 'integer', name: 'highest_tile' })
  highestTile!: number;

  @Column({ type: 'boolean', name: 'is_win', default: false })
  isWin!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;
}
