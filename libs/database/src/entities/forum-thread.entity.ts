import {
  Entity,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  OneToMany,
  JoinColumn,
  Index,
} from 'typeorm';
import { UlidEntity } from './ulid.entity';
import { User } from './user.entity';
import { ForumReply } from './forum-reply.entity';

/**
 * ForumThread entity. updatedAt doubles as "last activity" and is
 * touched whenever a reply is posted.
 */
@Entity('forum_threads')
@Index('IDX_forum_threads_activity', ['isPinned', 'updatedAt'])
export class ForumThread extends UlidEntity {
  @Index('IDX_forum_threads_user_id')
  @Column({ type: 'varchar', length: 26, name: 'user_id' })
  userId!: string;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text' })
  content!: string;

  @Column({ type: 'boolean', name: 'is_pinned', default: false })
  isPinned!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'user_id' })
  user!: User;

  @OneToMany(() => ForumReply, (reply) => reply.thread, { cascade: false })
  replies!: ForumReply[];
}
