import {
  Entity,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { UlidEntity } from './ulid.entity';
import { JobStatus } from '../enums/job-status.enum';
import { JobType } from '../enums/job-type.enum';
import { JobErrorKind } from '../enums/job-error-kind.enum';
import type { JsonObject } from '../types/json.types';

/**
 * Job entity: durable record of one unit of background work.
 *
 * The row is the source of truth for pollers; the Redis queue only
 * carries its id.
 *
 * Invariants:
 * - status moves PENDING → STARTED → COMPLETED | FAILED and never leaves
 *   a terminal state
 * - result is set only on COMPLETED
 * - errorKind and errorMessage are set only on FAILED
 * - attempts counts claims by a worker, including retries
 * - userId is null for system jobs (forum scheduling)
 */
@Entity('jobs')
@Index('IDX_jobs_status_created', ['status', 'createdAt'])
export class Job extends UlidEntity {
  @Column({ type: 'enum', enum: JobType })
  type!: JobType;

  @Index('IDX_jobs_user_id')
  @Column({ type: 'varchar', length: 26, name: 'user_id', nullable: true })
  userId!: string | null;

  @Column({ type: 'jsonb' })
  payload!: Record<string, unknown>;

  @Column({
    type: 'enum',
    enum: JobStatus,
    default: JobStatus.PENDING,
  })
  status!: JobStatus;

  @Column({ type: 'jsonb', nullable: true })
  result!: JsonObject | null;

  @Column({
    type: 'enum',
    enum: JobErrorKind,
    name: 'error_kind',
    nullable: true,
  })
  errorKind!: JobErrorKind | null;

  @Column({ type: 'text', name: 'error_message', nullable: true })
  errorMessage!: string | null;

  @Column({ type: 'smallint', default: 0 })
  attempts!: number;

  @Column({ type: 'timestamptz', name: 'started_at', nullable: true })
  startedAt!: Date | null;

  @Column({ type: 'timestamptz', name: 'completed_at', nullable: true })
  completedAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
