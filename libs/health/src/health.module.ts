import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { QueueHealthIndicator } from '@hairline/queue';
import { HealthController } from './health.controller';

/**
 * Needs a TypeORM connection and a global QueueModule in the importing
 * application.
 */
@Module({
  imports: [TerminusModule],
  controllers: [HealthController],
  providers: [QueueHealthIndicator],
})
export class HealthModule {}
