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
import { Certification } from './certification.entity';
import { PhotoSlot } from '../enums/photo-slot.enum';
import { PhotoValidationStatus } from '../enums/photo-validation-status.enum';

/**
 * CertificationPhoto entity: the current photo bound to one slot.
 *
 * Invariants:
 * - Unique per (certificationId, slot); a re-upload overwrites the row
 * - rejectionReason is set only when validationStatus is REJECTED
 */
@Entity('certification_photos')
@Index('IDX_certification_photos_slot', ['certificationId', 'slot'], {
  unique: true,
})
export class CertificationPhoto extends UlidEntity {
  @Column({ type: 'varchar', length: 26, name: 'certification_id' })
  certificationId!: string;

  @Column({ type: 'enum', enum: PhotoSlot })
  slot!: PhotoSlot;

  @Column({ type: 'varchar', length: 512, name: 'image_key' })
  imageKey!: string;

  @Column({ type: 'varchar', length: 128, name: 'media_type' })
  mediaType!: string;

  @Column({
    type: 'enum',
    enum: PhotoValidationStatus,
    name: 'validation_status',
    default: PhotoValidationStatus.PENDING,
  })
  validationStatus!: PhotoValidationStatus;

  @Column({ type: 'text', name: 'rejection_reason', nullable: true })
  rejectionReason!: string | null;

  @Column({ type: 'text', name: 'quality_notes', nullable: true })
  qualityNotes!: string | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => Certification, (certification) => certification.photos, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'certification_id' })
  certification!: Certification;
}
