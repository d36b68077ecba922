import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '@hairline/database';
import { QueueModule } from '@hairline/queue';
import { HealthModule } from '@hairline/health';
import { JobsModule } from './jobs/jobs.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres' as const,
        host: configService.get<string>('POSTGRES_HOST', 'localhost'),
        port: Number(configService.get<number>('POSTGRES_PORT', 5432)),
        username: configService.get<string>('POSTGRES_USER', 'hairline'),
        password: configService.get<string>(
          'POSTGRES_PASSWORD',
          'hairline_secret',
        ),
        database: configService.get<string>('POSTGRES_DB', 'hairline'),
        autoLoadEntities: true,
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') !== 'production',
      }),
    }),

    // ── Shared Database Repositories ─────────────────────
    DatabaseModule.forFeature(),

    // ── Job Queue (producer + blocking consumer) ─────────
    QueueModule.forRoot({ isGlobal: true, consume: true }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    JobsModule,
  ],
})
export class AppModule {}
