import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, LessThanOrEqual, Repository } from 'typeorm';
import { Subscription, exhaustMap, interval } from 'rxjs';
import { ForumAgentSchedule, Job, JobType } from '@hairline/database';
import { JobSubmitter } from '@hairline/queue';

export const DEFAULT_FORUM_SCHEDULER_INTERVAL_MS = 60_000;

/** Most schedules turned into jobs per tick. */
const TICK_BATCH_SIZE = 50;

/**
 * ForumSchedulerService: turns due persona schedules into reply jobs.
 *
 * Each due schedule has its `nextReplyAt` cleared in the same transaction
 * that creates its job, and only if it still holds the time that was
 * read, so a schedule yields at most one job per due time.
 */
@Injectable()
export class ForumSchedulerService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(ForumSchedulerService.name);
  private readonly intervalMs: number;
  private subscription: Subscription | null = null;

  constructor(
    @InjectRepository(ForumAgentSchedule)
    private readonly scheduleRepository: Repository<ForumAgentSchedule>,
    private readonly dataSource: DataSource,
    private readonly jobSubmitter: JobSubmitter,
    configService: ConfigService,
  ) {
    this.intervalMs = Number(
      configService.get<number>(
        'FORUM_SCHEDULER_INTERVAL_MS',
        DEFAULT_FORUM_SCHEDULER_INTERVAL_MS,
      ),
    );
  }

  onApplicationBootstrap(): void {
    this.subscription = interval(this.intervalMs)
      .pipe(exhaustMap(() => this.safeTick()))
      .subscribe();
  }

  onModuleDestroy(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  /**
   * @returns number of reply jobs created
   */
  async tick(now: Date = new Date()): Promise<number> {
    const due = await this.scheduleRepository.find({
      where: { isActive: true, nextReplyAt: LessThanOrEqual(now) },
      order: { nextReplyAt: 'ASC' },
      take: TICK_BATCH_SIZE,
    });

    const jobs: Job[] = [];

    for (const schedule of due) {
      const scheduledAt = schedule.nextReplyAt;
      if (!scheduledAt) {
        continue;
      }

      const job = await this.dataSource.transaction(async (manager) => {
        const claimed = await manager.update(
          ForumAgentSchedule,
          { id: schedule.id, nextReplyAt: scheduledAt },
          { nextReplyAt: null },
        );

        if (!claimed.affected) {
          return null;
        }

        return this.jobSubmitter.createJob(
          JobType.FORUM_AGENT_REPLY,
          { scheduleId: schedule.id },
          null,
          manager,
        );
      });

      if (job) {
        jobs.push(job);
      }
    }

    // Dispatch only after each job row has committed
    for (const job of jobs) {
      await this.jobSubmitter.dispatch(job);
    }

    if (jobs.length > 0) {
      this.logger.log(`Forum tick: ${jobs.length} persona reply job(s) created`);
    }

    return jobs.length;
  }

  private async safeTick(): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Forum tick failed: ${cause.message}`, cause.stack);
    }
  }
}
