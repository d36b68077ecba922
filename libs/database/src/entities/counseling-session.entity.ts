import {
  Entity,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { UlidEntity } from './ulid.entity';
import { CounselingMessage } from './counseling-message.entity';

/**
 * CounselingSession entity. The title stays null until the first
 * assistant reply, which derives one from the opening user message.
 */
@Entity('counseling_sessions')
export class CounselingSession extends UlidEntity {
  @Index('IDX_counseling_sessions_user_id')
  @Column({ type: 'varchar', length: 26, name: 'user_id' })
  userId!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  title!: string | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @OneToMany(() => CounselingMessage, (message) => message.session, {
    cascade: false,
  })
  messages!: CounselingMessage[];
}
