import { z } from 'zod';
import { AnalysisConfidence, NorwoodVariant } from '@hairline/database';

const norwoodStage = z
  .number()
  .int()
  .min(1)
  .max(7)
  .describe('Norwood stage, 1 (no recession) to 7 (most advanced)');

export const norwoodAnalysisSchema = z.object({
  norwoodStage,
  confidence: z.enum(AnalysisConfidence),
  title: z.string().min(1).describe('Short headline for the result'),
  description: z
    .string()
    .min(1)
    .describe('One or two sentences summarising the hairline'),
  analysisText: z
    .string()
    .min(1)
    .describe('Detailed observations about the hairline and crown'),
  reasoning: z.string().min(1).describe('Why this stage was chosen'),
});

export const photoValidationSchema = z.object({
  approved: z.boolean().describe('Whether the photo is usable for staging'),
  rejectionReason: z
    .string()
    .nullable()
    .describe('What the user must fix; null when approved'),
  qualityNotes: z
    .string()
    .nullable()
    .describe('Optional remarks on lighting, focus or framing'),
});

export const certificationDiagnosisSchema = z.object({
  norwoodStage,
  norwoodVariant: z
    .enum(NorwoodVariant)
    .nullable()
    .describe('A for the anterior pattern, V for the vertex pattern, else null'),
  confidence: z.number().min(0).max(1).describe('Confidence from 0 to 1'),
  clinicalAssessment: z
    .string()
    .min(1)
    .describe('Formal assessment written for the certificate'),
  observableFeatures: z
    .array(z.string().min(1))
    .describe('Individual findings visible across the three photos'),
  differentialConsiderations: z
    .string()
    .min(1)
    .describe('Adjacent stages considered and why they were ruled out'),
});

export const forumReplyDraftSchema = z.object({
  content: z.string().min(1).max(2000).describe('The forum post to publish'),
});

export type NorwoodAnalysis = z.infer<typeof norwoodAnalysisSchema>;
export type PhotoValidationVerdict = z.infer<typeof photoValidationSchema>;
export type CertificationDiagnosis = z.infer<
  typeof certificationDiagnosisSchema
>;
export type ForumReplyDraft = z.infer<typeof forumReplyDraftSchema>;
