import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration: creates the users and sessions tables.
 *
 * Hand-written to match the TypeORM entity definitions, including the
 * embedded RecordMetadata columns (created_at, updated_at, deleted_at).
 * The SQL is PostgreSQL-specific (serial, timestamptz).
 */
export class InitialSchema1760745600000 implements MigrationInterface {
  name = 'InitialSchema1760745600000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // ── Users table ────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"            SERIAL NOT NULL,
        "email"         varchar(255) NOT NULL,
        "password_hash" varchar(255) NOT NULL,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "deleted_at"    TIMESTAMPTZ,
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_users_email" UNIQUE ("email")
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_email" ON "users" ("email")`,
    );

    // ── Sessions table ─────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "sessions" (
        "id"            SERIAL NOT NULL,
        "user_id"       integer NOT NULL,
        "expires_at"    TIMESTAMPTZ NOT NULL,
        "last_used_at"  TIMESTAMPTZ NOT NULL,
        "last_used_ip"  varchar(64) NOT NULL DEFAULT '',
        "last_used_loc" varchar(512) NOT NULL DEFAULT '',
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "deleted_at"    TIMESTAMPTZ,
        CONSTRAINT "PK_sessions" PRIMARY KEY ("id"),
        CONSTRAINT "FK_sessions_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_sessions_user_id" ON "sessions" ("user_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_sessions_user_expires" ON "sessions" ("user_id", "expires_at")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // ── Drop tables (reverse order of creation) ────────────
    await queryRunner.query(`DROP TABLE IF EXISTS "sessions"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
  }
}
