import { Analysis, AnalysisConfidence, JobStatus } from '@hairline/database';

/** 202 body of POST /analyze. */
export interface AnalysisSubmittedDto {
  taskId: string;
  status: JobStatus;
}

export class AnalysisDto {
  id!: string;
  norwoodStage!: number;
  confidence!: AnalysisConfidence;
  title!: string;
  description!: string;
  analysisText!: string;
  reasoning!: string;
  /** Presigned, short-lived; null when the image was not kept */
  imageUrl!: string | null;
  createdAt!: Date;

  static fromEntity(analysis: Analysis, imageUrl: string | null): AnalysisDto {
    return Object.assign(new AnalysisDto(), {
      id: analysis.id,
      norwoodStage: analysis.norwoodStage,
      confidence: analysis.confidence,
      title: analysis.title,
      description: analysis.description,
      analysisText: analysis.analysisText,
      reasoning: analysis.reasoning,
      imageUrl,
      createdAt: analysis.createdAt,
    });
  }
}
