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
import { User } from './user.entity';
import { ForumThread } from './forum-thread.entity';
import { ForumPersona } from './forum-persona.entity';
import { GenerationStatus } from '../enums/generation-status.enum';

/**
 * ForumReply entity: written either by a user or by a persona.
 *
 * Invariants:
 * - Exactly one of userId / personaId is set
 * - User replies are stored COMPLETED; persona replies start PROCESSING
 *   and get their content from the worker
 * - parentId, when set, points at a reply in the same thread
 */
@Entity('forum_replies')
@Index('IDX_forum_replies_thread_created', ['threadId', 'createdAt'])
export class ForumReply extends UlidEntity {
  @Column({ type: 'varchar', length: 26, name: 'thread_id' })
  threadId!: string;

  @Column({ type: 'varchar', length: 26, name: 'user_id', nullable: true })
  userId!: string | null;

  @Column({ type: 'varchar', length: 26, name: 'persona_id', nullable: true })
  personaId!: string | null;

  @Column({ type: 'varchar', length: 26, name: 'parent_id', nullable: true })
  parentId!: string | null;

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

  @ManyToOne(() => ForumThread, (thread) => thread.replies, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'thread_id' })
  thread!: ForumThread;

  @ManyToOne(() => User, { onDelete: 'CASCADE', nullable: true })
  @JoinColumn({ name: 'user_id' })
  user!: User | null;

  @ManyToOne(() => ForumPersona, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'persona_id' })
  persona!: ForumPersona | null;
}
