import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENTITIES } from './entities';

/**
 * DatabaseModule: registers all TypeORM entity repositories.
 *
 * Import this module in both api-gateway and worker to get access
 * to the entity repositories via dependency injection.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [DatabaseModule.forFeature()],
 * })
 * export class SomeFeatureModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature([...ENTITIES])],
      exports: [TypeOrmModule],
    };
  }

  /** Entity classes, for TypeOrmModule.forRoot({ entities }) or a DataSource. */
  static get entities(): ReadonlyArray<Function> {
    return ENTITIES;
  }
}
