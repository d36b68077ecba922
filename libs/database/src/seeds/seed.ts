import { Logger } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import AppDataSource from '../data-source';
import { User } from '../entities/user.entity';
import { ForumPersona } from '../entities/forum-persona.entity';
import { ForumThread } from '../entities/forum-thread.entity';
import personas from './personas.json';

/**
 * Seed script: populates the database with demo accounts, the forum
 * personas and a pinned welcome thread.
 *
 * Usage:
 *   npm run build && npm run migration:run && npm run seed
 *
 * This script is idempotent: it truncates all tables before inserting.
 */

/** Password shared by every demo account. */
const DEMO_PASSWORD = 'password123';

interface SeedUser {
  email: string;
  fullName: string;
  isActive: boolean;
  isPremium: boolean;
  isAdmin: boolean;
  freeAnalysesRemaining: number;
}

interface SeedPersona {
  name: string;
  systemPrompt: string;
}

const USERS: SeedUser[] = [
  {
    email: 'admin@hairline.test',
    fullName: 'Ada Admin',
    isActive: true,
    isPremium: true,
    isAdmin: true,
    freeAnalysesRemaining: 0,
  },
  {
    email: 'premium@hairline.test',
    fullName: 'Pat Premium',
    isActive: true,
    isPremium: true,
    isAdmin: false,
    freeAnalysesRemaining: 0,
  },
  {
    email: 'free@hairline.test',
    fullName: 'Frankie Free',
    isActive: true,
    isPremium: false,
    isAdmin: false,
    freeAnalysesRemaining: 1,
  },
];

const PERSONAS: SeedPersona[] = personas;

async function seed(): Promise<void> {
  const logger = new Logger('Seed');

  logger.log('Initializing data source...');
  await AppDataSource.initialize();

  const queryRunner = AppDataSource.createQueryRunner();
  await queryRunner.connect();
  await queryRunner.startTransaction();

  try {
    logger.log('Truncating tables...');
    await queryRunner.query(
      'TRUNCATE TABLE game_2048_scores, counseling_messages, counseling_sessions, ' +
        'forum_agent_schedules, forum_replies, forum_threads, forum_personas, ' +
        'certification_photos, certifications, analyses, jobs, users CASCADE',
    );

    // ── Insert Users ───────────────────────────────────────
    const passwordHash = await bcrypt.hash(DEMO_PASSWORD, 12);
    const userRepo = queryRunner.manager.getRepository(User);
    const savedUsers = await userRepo.save(
      USERS.map((u) => userRepo.create({ ...u, passwordHash })),
    );
    logger.log(`✓ Inserted ${savedUsers.length} users`);

    // ── Insert Personas ────────────────────────────────────
    const personaRepo = queryRunner.manager.getRepository(ForumPersona);
    const savedPersonas = await personaRepo.save(
      PERSONAS.map((p) => personaRepo.create({ ...p, isActive: true })),
    );
    logger.log(`✓ Inserted ${savedPersonas.length} forum personas`);

    // ── Insert Welcome Thread ──────────────────────────────
    const threadRepo = queryRunner.manager.getRepository(ForumThread);
    await threadRepo.save(
      threadRepo.create({
        userId: savedUsers[0].id,
        title: 'Welcome to the forum',
        content:
          'Introduce yourself, share your Norwood journey and be kind. ' +
          'Our resident regulars drop by every now and then.',
        isPinned: true,
      }),
    );
    logger.log('✓ Inserted welcome thread');

    await queryRunner.commitTransaction();
    logger.log('─────────────────────────────────────────');
    logger.log('✅ Seed completed successfully!');
    logger.log(`   Users:    ${savedUsers.length} (password "${DEMO_PASSWORD}")`);
    logger.log(`   Personas: ${savedPersonas.length}`);
  } catch (error) {
    logger.error('Seed failed, rolling back transaction...');
    await queryRunner.rollbackTransaction();
    throw error;
  } finally {
    await queryRunner.release();
    await AppDataSource.destroy();
  }
}

seed().catch((error: Error) => {
  // eslint-disable-next-line no-console
  console.error('Fatal seed error:', error.message);
  process.exit(1);
});
