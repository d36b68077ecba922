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
import { ForumThread } from './forum-thread.entity';
import { ForumPersona } from './forum-persona.entity';

/**
 * ForumAgentSchedule entity: when a persona next revisits a thread.
 *
 * Invariants:
 * - Unique per (threadId, personaId)
 * - replyCount only grows; it drives the backoff between replies
 * - nextReplyAt is null while a reply job for this schedule is in flight
 */
@Entity('forum_agent_schedules')
@Index('IDX_forum_agent_schedules_pair', ['threadId', 'personaId'], {
  unique: true,
})
@Index('IDX_forum_agent_schedules_due', ['isActive', 'nextReplyAt'])
export class ForumAgentSchedule extends UlidEntity {
  @Column({ type: 'varchar', length: 26, name: 'thread_id' })
  threadId!: string;

  @Column({ type: 'varchar', length: 26, name: 'persona_id' })
  personaId!: string;

  @Column({ type: 'timestamptz', name: 'next_reply_at', nullable: true })
  nextReplyAt!: Date | null;

  @Column({ type: 'integer', name: 'reply_count', default: 0 })
  replyCount!: number;

  @Column({ type: 'timestamptz', name: 'last_replied_at', nullable: true })
  lastRepliedAt!: Date | null;

  @Column({ type: 'boolean', name: 'is_active', default: true })
  isActive!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => ForumThread, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'thread_id' })
  thread!: ForumThread;

  @ManyToOne(() => ForumPersona, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'persona_id' })
  persona!: ForumPersona;
}
