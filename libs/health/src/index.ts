/**
 * @hairline/health
 *
 * Terminus health endpoint shared by the api-gateway and the worker.
 */
export { HealthModule } from './health.module';
export { HealthController } from './health.controller';
