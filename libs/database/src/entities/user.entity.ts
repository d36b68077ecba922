import {
  Entity,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { UlidEntity } from './ulid.entity';
import { Analysis } from './analysis.entity';
import { Certification } from './certification.entity';

/** Per-user display preferences stored as jsonb. */
export interface UserOptions {
  showOnLeaderboard: boolean;
}

export const DEFAULT_USER_OPTIONS: UserOptions = { showOnLeaderboard: true };

/**
 * User entity: an account holder.
 *
 * Invariants:
 * - Email is unique and stored lowercased
 * - Password is stored as a bcrypt hash, never in plaintext
 * - freeAnalysesRemaining only matters while isPremium is false
 * - isAdmin accounts bypass the certification cooldown
 * - Deleting a user cascades to everything they own
 */
@Entity('users')
export class User extends UlidEntity {
  @Index('IDX_users_email', { unique: true })
  @Column({ type: 'varchar', length: 255, unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  passwordHash!: string;

  @Column({ type: 'varchar', length: 255, name: 'full_name' })
  fullName!: string;

  @Column({ type: 'boolean', name: 'is_active', default: true })
  isActive!: boolean;

  @Column({ type: 'boolean', name: 'is_premium', default: false })
  isPremium!: boolean;

  @Column({ type: 'boolean', name: 'is_admin', default: false })
  isAdmin!: boolean;

  @Column({ type: 'integer', name: 'free_analyses_remaining', default: 1 })
  freeAnalysesRemaining!: number;

  @Column({ type: 'jsonb', default: () => `'{"showOnLeaderboard": true}'` })
  options!: UserOptions;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @OneToMany(() => Analysis, (analysis) => analysis.user, { cascade: false })
  analyses!: Analysis[];

  @OneToMany(() => Certification, (certification) => certification.user, {
    cascade: false,
  })
  certifications!: Certification[];
}
