import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Job } from '@hairline/database';
import { AnalysisModule } from '../analysis/analysis.module';
import { AnalysisJobHandler } from '../analysis/analysis-job.handler';
import { CertificationModule } from '../certification/certification.module';
import { PhotoValidationHandler } from '../certification/photo-validation.handler';
import { CertificationDiagnosisHandler } from '../certification/certification-diagnosis.handler';
import { CounselingModule } from '../counseling/counseling.module';
import { CounselingReplyHandler } from '../counseling/counseling-reply.handler';
import { ForumModule } from '../forum/forum.module';
import { ForumScheduleInitHandler } from '../forum/forum-schedule-init.handler';
import { ForumScheduleBumpHandler } from '../forum/forum-schedule-bump.handler';
import { ForumAgentReplyHandler } from '../forum/forum-agent-reply.handler';
import { ForumDirectReplyHandler } from '../forum/forum-direct-reply.handler';
import { RegisteredJobHandler } from './job-handler';
import { JobRunnerService } from './job-runner.service';
import { JobRecoveryService } from './job-recovery.service';
import { JOB_HANDLERS } from './jobs.constants';

const HANDLER_CLASSES = [
  AnalysisJobHandler,
  PhotoValidationHandler,
  CertificationDiagnosisHandler,
  CounselingReplyHandler,
  ForumScheduleInitHandler,
  ForumScheduleBumpHandler,
  ForumAgentReplyHandler,
  ForumDirectReplyHandler,
];

/**
 * JobsModule: the consume loop and the recovery sweep.
 *
 * Feature modules export their handlers; they are gathered here into the
 * JOB_HANDLERS array the runner indexes by job type. The consumer and
 * producer come from the global QueueModule.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([Job]),
    AnalysisModule,
    CertificationModule,
    CounselingModule,
    ForumModule,
  ],
  providers: [
    {
      provide: JOB_HANDLERS,
      inject: HANDLER_CLASSES,
      useFactory: (...handlers: RegisteredJobHandler[]) => handlers,
    },
    JobRunnerService,
    JobRecoveryService,
  ],
})
export class JobsModule {}
