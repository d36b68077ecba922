import { z } from 'zod';
import { JobType } from '@hairline/database';

/**
 * Payload contracts shared by the gateway (which writes them into
 * `jobs.payload`) and the worker (which parses them before running a
 * handler). Only ids and object keys travel here; handlers load the rows
 * themselves.
 */

export const analysisPayloadSchema = z.object({
  imageKey: z.string().min(1),
  mediaType: z.string().min(1),
});

export const photoValidationPayloadSchema = z.object({
  photoId: z.string().min(1),
  /** The upload being judged; a re-upload of the slot supersedes it. */
  imageKey: z.string().min(1),
});

export const certificationDiagnosisPayloadSchema = z.object({
  certificationId: z.string().min(1),
});

export const counselingReplyPayloadSchema = z.object({
  messageId: z.string().min(1),
});

export const forumThreadPayloadSchema = z.object({
  threadId: z.string().min(1),
});

export const forumAgentReplyPayloadSchema = z.object({
  scheduleId: z.string().min(1),
});

export const forumDirectReplyPayloadSchema = z.object({
  threadId: z.string().min(1),
  parentReplyId: z.string().min(1),
});

export const JOB_PAYLOAD_SCHEMAS = {
  [JobType.ANALYSIS]: analysisPayloadSchema,
  [JobType.PHOTO_VALIDATION]: photoValidationPayloadSchema,
  [JobType.CERTIFICATION_DIAGNOSIS]: certificationDiagnosisPayloadSchema,
  [JobType.COUNSELING_REPLY]: counselingReplyPayloadSchema,
  [JobType.FORUM_SCHEDULE_INIT]: forumThreadPayloadSchema,
  [JobType.FORUM_SCHEDULE_BUMP]: forumThreadPayloadSchema,
  [JobType.FORUM_AGENT_REPLY]: forumAgentReplyPayloadSchema,
  [JobType.FORUM_DIRECT_REPLY]: forumDirectReplyPayloadSchema,
} as const satisfies { [T in JobType]: z.ZodType };

export type JobPayloadMap = {
  [T in JobType]: z.infer<(typeof JOB_PAYLOAD_SCHEMAS)[T]>;
};

export type AnalysisPayload = JobPayloadMap[JobType.ANALYSIS];
export type PhotoValidationPayload = JobPayloadMap[JobType.PHOTO_VALIDATION];
export type CertificationDiagnosisPayload =
  JobPayloadMap[JobType.CERTIFICATION_DIAGNOSIS];
export type CounselingReplyPayload = JobPayloadMap[JobType.COUNSELING_REPLY];
export type ForumThreadPayload = JobPayloadMap[JobType.FORUM_SCHEDULE_INIT];
export type ForumAgentReplyPayload = JobPayloadMap[JobType.FORUM_AGENT_REPLY];
export type ForumDirectReplyPayload = JobPayloadMap[JobType.FORUM_DIRECT_REPLY];
