import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { QueueHealthIndicator } from '@hairline/queue';

const DATABASE_PING_TIMEOUT_MS = 3000;

/** `GET /health` for both processes: Postgres and the queue's Redis. */
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly db: TypeOrmHealthIndicator,
    private readonly queue: QueueHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      () =>
        this.db.pingCheck('database', { timeout: DATABASE_PING_TIMEOUT_MS }),
      () => this.queue.isHealthy('redis'),
    ]);
  }
}
