import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '@hairline/database';
import { QueueModule } from '@hairline/queue';
import { HealthModule } from '@hairline/health';
import { AuthModule } from './auth/auth.module';
import { TasksModule } from './tasks/tasks.module';
import { AnalysesModule } from './analyses/analyses.module';
import { CertificationModule } from './certification/certification.module';
import { ForumModule } from './forum/forum.module';
import { CounselingModule } from './counseling/counseling.module';
import { LeaderboardModule } from './leaderboard/leaderboard.module';
import { Game2048Module } from './game2048/game2048.module';

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

    // ── Job Queue (submit only) ──────────────────────────
    QueueModule.forRoot({ isGlobal: true }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AuthModule,
    TasksModule,
    AnalysesModule,
    CertificationModule,
    ForumModule,
    CounselingModule,
    LeaderboardModule,
    Game2048Module,
  ],
})
export class AppModule {}
