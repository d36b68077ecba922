import {
  CertificationStatus,
  NorwoodVariant,
  PhotoSlot,
  PhotoValidationStatus,
} from '@hairline/database';

export interface CooldownDto {
  onCooldown: boolean;
  daysRemaining: number;
  lastCertifiedAt: Date | null;
}

export interface StartCertificationDto {
  certificationId: string;
  status: CertificationStatus;
}

export interface PhotoUploadedDto {
  photoId: string;
  taskId: string;
  slot: PhotoSlot;
}

export interface DiagnoseResponseDto {
  taskId: string;
}

export interface PhotoStatusDto {
  photoId: string;
  slot: PhotoSlot;
  validationStatus: PhotoValidationStatus;
  rejectionReason: string | null;
  qualityNotes: string | null;
  imageUrl: string;
}

/** Diagnosis fields stay null until the certification completes. */
export interface CertificationStatusDto {
  certificationId: string;
  status: CertificationStatus;
  photos: PhotoStatusDto[];
  norwoodStage: number | null;
  norwoodVariant: NorwoodVariant | null;
  confidence: number | null;
  clinicalAssessment: string | null;
  observableFeatures: string[] | null;
  differentialConsiderations: string | null;
  pdfUrl: string | null;
  certifiedAt: Date | null;
}

export interface CertificationHistoryItemDto {
  id: string;
  norwoodStage: number | null;
  norwoodVariant: NorwoodVariant | null;
  confidence: number | null;
  certifiedAt: Date | null;
  pdfUrl: string | null;
}

export interface PublicCertificationDto {
  certificationId: string;
  norwoodStage: number | null;
  norwoodVariant: NorwoodVariant | null;
  confidence: number | null;
  certifiedAt: Date | null;
  holderName: string;
}
