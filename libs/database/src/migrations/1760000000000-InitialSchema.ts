import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration: creates every table used by the gateway and
 * the worker.
 *
 * Hand-written to match the entity definitions. Primary keys are ULIDs
 * generated by the application (varchar(26)), so no uuid extension is
 * needed.
 */
export class InitialSchema1760000000000 implements MigrationInterface {
  name = 'InitialSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // ── Create enum types ──────────────────────────────────
    await queryRunner.query(
      `CREATE TYPE "jobs_type_enum" AS ENUM ('analysis', 'photo_validation', 'certification_diagnosis', 'counseling_reply', 'forum_schedule_init', 'forum_schedule_bump', 'forum_agent_reply', 'forum_direct_reply')`,
    );
    await queryRunner.query(
      `CREATE TYPE "jobs_status_enum" AS ENUM ('pending', 'started', 'completed', 'failed')`,
    );
    await queryRunner.query(
      `CREATE TYPE "jobs_error_kind_enum" AS ENUM ('upstream', 'validation', 'not_found', 'internal')`,
    );
    await queryRunner.query(
      `CREATE TYPE "analyses_confidence_enum" AS ENUM ('low', 'medium', 'high')`,
    );
    await queryRunner.query(
      `CREATE TYPE "certifications_status_enum" AS ENUM ('photos_pending', 'analyzing', 'completed', 'failed')`,
    );
    await queryRunner.query(
      `CREATE TYPE "certifications_norwood_variant_enum" AS ENUM ('A', 'V')`,
    );
    await queryRunner.query(
      `CREATE TYPE "certification_photos_slot_enum" AS ENUM ('front', 'left', 'right')`,
    );
    await queryRunner.query(
      `CREATE TYPE "certification_photos_validation_status_enum" AS ENUM ('pending', 'approved', 'rejected')`,
    );
    await queryRunner.query(
      `CREATE TYPE "forum_replies_status_enum" AS ENUM ('pending', 'processing', 'completed', 'failed')`,
    );
    await queryRunner.query(
      `CREATE TYPE "counseling_messages_role_enum" AS ENUM ('user', 'assistant')`,
    );
    await queryRunner.query(
      `CREATE TYPE "counseling_messages_status_enum" AS ENUM ('pending', 'processing', 'completed', 'failed')`,
    );

    // ── Users table ────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"                      varchar(26) NOT NULL,
        "email"                   varchar(255) NOT NULL,
        "password_hash"           varchar(255) NOT NULL,
        "full_name"               varchar(255) NOT NULL,
        "is_active"               boolean NOT NULL DEFAULT true,
        "is_premium"              boolean NOT NULL DEFAULT false,
        "is_admin"                boolean NOT NULL DEFAULT false,
        "free_analyses_remaining" integer NOT NULL DEFAULT 1,
        "options"                 jsonb NOT NULL DEFAULT '{"showOnLeaderboard": true}',
        "created_at"              TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"              TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_users_email" UNIQUE ("email")
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_email" ON "users" ("email")`,
    );

    // ── Jobs table ─────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "jobs" (
        "id"            varchar(26) NOT NULL,
        "type"          "jobs_type_enum" NOT NULL,
        "user_id"       varchar(26),
        "payload"       jsonb NOT NULL,
        "status"        "jobs_status_enum" NOT NULL DEFAULT 'pending',
        "result"        jsonb,
        "error_kind"    "jobs_error_kind_enum",
        "error_message" text,
        "attempts"      smallint NOT NULL DEFAULT 0,
        "started_at"    TIMESTAMPTZ,
        "completed_at"  TIMESTAMPTZ,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_jobs" PRIMARY KEY ("id"),
        CONSTRAINT "FK_jobs_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_jobs_user_id" ON "jobs" ("user_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_jobs_status_created" ON "jobs" ("status", "created_at")`,
    );

    // ── Analyses table ─────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "analyses" (
        "id"            varchar(26) NOT NULL,
        "user_id"       varchar(26) NOT NULL,
        "image_key"     varchar(512),
        "norwood_stage" smallint NOT NULL,
        "confidence"    "analyses_confidence_enum" NOT NULL,
        "title"         varchar(255) NOT NULL,
        "description"   text NOT NULL,
        "analysis_text" text NOT NULL,
        "reasoning"     text NOT NULL,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_analyses" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_analyses_norwood_stage" CHECK ("norwood_stage" BETWEEN 1 AND 7),
        CONSTRAINT "FK_analyses_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_analyses_user_created" ON "analyses" ("user_id", "created_at")`,
    );

    // ── Certifications table ───────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "certifications" (
        "id"                          varchar(26) NOT NULL,
        "user_id"                     varchar(26) NOT NULL,
        "status"                      "certifications_status_enum" NOT NULL DEFAULT 'photos_pending',
        "norwood_stage"               smallint,
        "norwood_variant"             "certifications_norwood_variant_enum",
        "confidence"                  double precision,
        "clinical_assessment"         text,
        "observable_features"         jsonb,
        "differential_considerations" text,
        "pdf_key"                     varchar(512),
        "certified_at"                TIMESTAMPTZ,
        "created_at"                  TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"                  TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_certifications" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_certifications_norwood_stage" CHECK ("norwood_stage" BETWEEN 1 AND 7),
        CONSTRAINT "CHK_certifications_confidence" CHECK ("confidence" BETWEEN 0 AND 1),
        CONSTRAINT "FK_certifications_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_certifications_user_status" ON "certifications" ("user_id", "status")`,
    );
    // At most one in-flight certification per user
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_certifications_user_in_flight" ON "certifications" ("user_id") WHERE "status" IN ('photos_pending', 'analyzing')`,
    );

    // ── Certification Photos table ─────────────────────────
    await queryRunner.query(`
      CREATE TABLE "certification_photos" (
        "id"                varchar(26) NOT NULL,
        "certification_id"  varchar(26) NOT NULL,
        "slot"              "certification_photos_slot_enum" NOT NULL,
        "image_key"         varchar(512) NOT NULL,
        "media_type"        varchar(128) NOT NULL,
        "validation_status" "certification_photos_validation_status_enum" NOT NULL DEFAULT 'pending',
        "rejection_reason"  text,
        "quality_notes"     text,
        "created_at"        TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"        TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_certification_photos" PRIMARY KEY ("id"),
        CONSTRAINT "FK_certification_photos_certification" FOREIGN KEY ("certification_id")
          REFERENCES "certifications"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_certification_photos_slot" ON "certification_photos" ("certification_id", "slot")`,
    );

    // ── Forum Personas table ───────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "forum_personas" (
        "id"            varchar(26) NOT NULL,
        "name"          varchar(100) NOT NULL,
        "system_prompt" text NOT NULL,
        "is_active"     boolean NOT NULL DEFAULT true,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_forum_personas" PRIMARY KEY ("id")
      )
    `);

    // ── Forum Threads table ────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "forum_threads" (
        "id"          varchar(26) NOT NULL,
        "user_id"     varchar(26) NOT NULL,
        "title"       varchar(200) NOT NULL,
        "content"     text NOT NULL,
        "is_pinned"   boolean NOT NULL DEFAULT false,
        "created_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_forum_threads" PRIMARY KEY ("id"),
        CONSTRAINT "FK_forum_threads_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_forum_threads_user_id" ON "forum_threads" ("user_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_forum_threads_activity" ON "forum_threads" ("is_pinned", "updated_at")`,
    );

    // ── Forum Replies table ────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "forum_replies" (
        "id"          varchar(26) NOT NULL,
        "thread_id"   varchar(26) NOT NULL,
        "user_id"     varchar(26),
        "persona_id"  varchar(26),
        "parent_id"   varchar(26),
        "content"     text,
        "status"      "forum_replies_status_enum" NOT NULL DEFAULT 'completed',
        "created_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_forum_replies" PRIMARY KEY ("id"),
        CONSTRAINT "FK_forum_replies_thread" FOREIGN KEY ("thread_id")
          REFERENCES "forum_threads"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_forum_replies_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_forum_replies_persona" FOREIGN KEY ("persona_id")
          REFERENCES "forum_personas"("id") ON DELETE SET NULL ON UPDATE NO ACTION,
        CONSTRAINT "FK_forum_replies_parent" FOREIGN KEY ("parent_id")
          REFERENCES "forum_replies"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_forum_replies_thread_created" ON "forum_replies" ("thread_id", "created_at")`,
    );

    // ── Forum Agent Schedules table ────────────────────────
    await queryRunner.query(`
      CREATE TABLE "forum_agent_schedules" (
        "id"              varchar(26) NOT NULL,
        "thread_id"       varchar(26) NOT NULL,
        "persona_id"      varchar(26) NOT NULL,
        "next_reply_at"   TIMESTAMPTZ,
        "reply_count"     integer NOT NULL DEFAULT 0,
        "last_replied_at" TIMESTAMPTZ,
        "is_active"       boolean NOT NULL DEFAULT true,
        "created_at"      TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"      TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_forum_agent_schedules" PRIMARY KEY ("id"),
        CONSTRAINT "FK_forum_agent_schedules_thread" FOREIGN KEY ("thread_id")
          REFERENCES "forum_threads"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_forum_agent_schedules_persona" FOREIGN KEY ("persona_id")
          REFERENCES "forum_personas"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_forum_agent_schedules_pair" ON "forum_agent_schedules" ("thread_id", "persona_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_forum_agent_schedules_due" ON "forum_agent_schedules" ("is_active", "next_reply_at")`,
    );

    // ── Counseling tables ──────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "counseling_sessions" (
        "id"          varchar(26) NOT NULL,
        "user_id"     varchar(26) NOT NULL,
        "title"       varchar(255),
        "created_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_counseling_sessions" PRIMARY KEY ("id"),
        CONSTRAINT "FK_counseling_sessions_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_counseling_sessions_user_id" ON "counseling_sessions" ("user_id")`,
    );

    await queryRunner.query(`
      CREATE TABLE "counseling_messages" (
        "id"          varchar(26) NOT NULL,
        "session_id"  varchar(26) NOT NULL,
        "role"        "counseling_messages_role_enum" NOT NULL,
        "content"     text,
        "status"      "counseling_messages_status_enum" NOT NULL DEFAULT 'completed',
        "created_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_counseling_messages" PRIMARY KEY ("id"),
        CONSTRAINT "FK_counseling_messages_session" FOREIGN KEY ("session_id")
          REFERENCES "counseling_sessions"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_counseling_messages_session_created" ON "counseling_messages" ("session_id", "created_at")`,
    );

    // ── 2048 Scores table ──────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "game_2048_scores" (
        "id"           varchar(26) NOT NULL,
        "user_id"      varchar(26) NOT NULL,
        "score"        integer NOT NULL,
        "highest_tile" integer NOT NULL,
        "is_win"       boolean NOT NULL DEFAULT false,
        "created_at"   TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_game_2048_scores" PRIMARY KEY ("id"),
        CONSTRAINT "FK_game_2048_scores_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_game_2048_scores_user_score" ON "game_2048_scores" ("user_id", "score")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // Drop in reverse dependency order
    await queryRunner.query(`DROP TABLE IF EXISTS "game_2048_scores"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "counseling_messages"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "counseling_sessions"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "forum_agent_schedules"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "forum_replies"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "forum_threads"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "forum_personas"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "certification_photos"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "certifications"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "analyses"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "jobs"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);

    await queryRunner.query(`DROP TYPE IF EXISTS "counseling_messages_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "counseling_messages_role_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "forum_replies_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "certification_photos_validation_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "certification_photos_slot_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "certifications_norwood_variant_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "certifications_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "analyses_confidence_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "jobs_error_kind_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "jobs_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "jobs_type_enum"`);
  }
}
