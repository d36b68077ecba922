// ── Entities ────────────────────────────────────────────────
export { UlidEntity } from './entities/ulid.entity';
export { User, DEFAULT_USER_OPTIONS } from './entities/user.entity';
export type { UserOptions } from './entities/user.entity';
export { Job } from './entities/job.entity';
export { Analysis } from './entities/analysis.entity';
export { Certification } from './entities/certification.entity';
export { CertificationPhoto } from './entities/certification-photo.entity';
export { ForumPersona } from './entities/forum-persona.entity';
export { ForumThread } from './entities/forum-thread.entity';
export { ForumReply } from './entities/forum-reply.entity';
export { ForumAgentSchedule } from './entities/forum-agent-schedule.entity';
export { CounselingSession } from './entities/counseling-session.entity';
export { CounselingMessage } from './entities/counseling-message.entity';
export { Game2048Score } from './entities/game-2048-score.entity';

// ── Enums ───────────────────────────────────────────────────
export { JobStatus, TERMINAL_JOB_STATUSES } from './enums/job-status.enum';
export { JobType } from './enums/job-type.enum';
export { JobErrorKind } from './enums/job-error-kind.enum';
export {
  CertificationStatus,
  NON_TERMINAL_CERTIFICATION_STATUSES,
} from './enums/certification-status.enum';
export { PhotoSlot, PHOTO_SLOTS } from './enums/photo-slot.enum';
export { PhotoValidationStatus } from './enums/photo-validation-status.enum';
export { AnalysisConfidence } from './enums/analysis-confidence.enum';
export { NorwoodVariant } from './enums/norwood-variant.enum';
export { GenerationStatus } from './enums/generation-status.enum';
export { CounselingRole } from './enums/counseling-role.enum';

// ── Types ───────────────────────────────────────────────────
export type { JsonPrimitive, JsonValue, JsonObject } from './types/json.types';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
