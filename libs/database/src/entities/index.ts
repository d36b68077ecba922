import { User } from './user.entity';
import { Job } from './job.entity';
import { Analysis } from './analysis.entity';
import { Certification } from './certification.entity';
import { CertificationPhoto } from './certification-photo.entity';
import { ForumPersona } from './forum-persona.entity';
import { ForumThread } from './forum-thread.entity';
import { ForumReply } from './forum-reply.entity';
import { ForumAgentSchedule } from './forum-agent-schedule.entity';
import { CounselingSession } from './counseling-session.entity';
import { CounselingMessage } from './counseling-message.entity';
import { Game2048Score } from './game-2048-score.entity';

/** All entity classes registered in this database library */
export const ENTITIES = [
  User,
  Job,
  Analysis,
  Certification,
  CertificationPhoto,
  ForumPersona,
  ForumThread,
  ForumReply,
  ForumAgentSchedule,
  CounselingSession,
  CounselingMessage,
  Game2048Score,
] as const;
