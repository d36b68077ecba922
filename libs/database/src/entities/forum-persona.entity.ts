import { Entity, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { UlidEntity } from './ulid.entity';

/**
 * ForumPersona entity: a simulated forum participant. The systemPrompt
 * defines its voice; inactive personas are never scheduled.
 */
@Entity('forum_personas')
export class ForumPersona extends UlidEntity {
  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'text', name: 'system_prompt' })
  systemPrompt!: string;

  @Column({ type: 'boolean', name: 'is_active', default: true })
  isActive!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
