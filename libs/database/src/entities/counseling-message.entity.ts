import {
  Entity,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { UlidEntity } from './ulid.entity';
import { CounselingSession } from './counseling-session.entity';
import { CounselingRole } from '../enums/counseling-role.enum';
import { GenerationStatus } from '../enums/generation-status.enum';

/**
 * CounselingMessage entity: one turn of a session. Assistant messages
 * are created PENDING with null content and filled in by the worker.
 */
@Entity('counseling_messages')
@Index('IDX_counseling_messages_session_created', ['sessionId', 'createdAt'])
export class CounselingMessage extends UlidEntity {
  @Column({ type: 'varchar', length: 26, name: 'session_id' })
  sessionId!: string;

  @Column({ type: 'enum', enum: CounselingRole })
  role!: CounselingRole;

  @Column({ type: 'text', nullable: true })
  content!: string | null;

  @Column({
    type: 'enum',
    enum: GenerationStatus,
    default: GenerationStatus.COMPLETED,
  })
  status!: GenerationStatus;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => CounselingSession, (session) => session.messages, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'session_id' })
  session!: CounselingSession;
}
