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
import { CertificationPhoto } from './certification-photo.entity';
import { CertificationStatus } from '../enums/certification-status.enum';
import { NorwoodVariant } from '../enums/norwood-variant.enum';

/**
 * Certification entity: one three-photo classification attempt.
 *
 * Invariants:
 * - At most one PHOTOS_PENDING or ANALYZING certification per user
 *   (partial unique index, see migration)
 * - ANALYZING only after front, left and right photos are all APPROVED
 * - Diagnosis columns are written before the PDF is rendered; pdfKey and
 *   certifiedAt are set together with status COMPLETED
 */
@Entity('certifications')
@Index('IDX_certifications_user_status', ['userId', 'status'])
export class Certification extends UlidEntity {
  @Column({ type: 'varchar', length: 26, name: 'user_id' })
  userId!: string;

  @Column({
    type: 'enum',
    enum: CertificationStatus,
    default: CertificationStatus.PHOTOS_PENDING,
  })
  status!: CertificationStatus;

  @Column({ type: 'smallint', name: 'norwood_stage', nullable: true })
  norwoodStage!: number | null;

  @Column({
    type: 'enum',
    enum: NorwoodVariant,
    name: 'norwood_variant',
    nullable: true,
  })
  norwoodVariant!: NorwoodVariant | null;

  @Column({ type: 'double precision', nullable: true })
  confidence!: number | null;

  @Column({ type: 'text', name: 'clinical_assessment', nullable: true })
  clinicalAssessment!: string | null;

  @Column({ type: 'jsonb', name: 'observable_features', nullable: true })
  observableFeatures!: string[] | null;

  @Column({ type: 'text', name: 'differential_considerations', nullable: true })
  differentialConsiderations!: string | null;

  @Column({ type: 'varchar', length: 512, name: 'pdf_key', nullable: true })
  pdfKey!: string | null;

  @Column({ type: 'timestamptz', name: 'certified_at', nullable: true })
  certifiedAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, (user) => user.certifications, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'user_id' })
  user!: User;

  @OneToMany(() => CertificationPhoto, (photo) => photo.certification, {
    cascade: false,
  })
  photos!: CertificationPhoto[];
}
