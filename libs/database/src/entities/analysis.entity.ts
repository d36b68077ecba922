import {
  Entity,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { UlidEntity } from './ulid.entity';
import { User } from './user.entity';
import { AnalysisConfidence } from '../enums/analysis-confidence.enum';

/**
 * Analysis entity: result of one single-photo Norwood classification.
 * Rows are written by the worker once the LLM call succeeds.
 */
@Entity('analyses')
@Index('IDX_analyses_user_created', ['userId', 'createdAt'])
export class Analysis extends UlidEntity {
  @Column({ type: 'varchar', length: 26, name: 'user_id' })
  userId!: string;

  @Column({ type: 'varchar', length: 512, name: 'image_key', nullable: true })
  imageKey!: string | null;

  @Column({ type: 'smallint', name: 'norwood_stage' })
  norwoodStage!: number;

  @Column({ type: 'enum', enum: AnalysisConfidence })
  confidence!: AnalysisConfidence;

  @Column({ type: 'varchar', length: 255 })
  title!: string;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'text', name: 'analysis_text' })
  analysisText!: string;

  @Column({ type: 'text' })
  reasoning!: string;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, (user) => user.analyses, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'user_id' })
  user!: User;
}
