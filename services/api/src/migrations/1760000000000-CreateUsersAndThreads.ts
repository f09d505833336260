import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial migration for the conversation core.
 *
 * Creates the following:
 * - users table (skipped when the auth system already created it)
 * - threads table, unique participant key among active threads
 * - messages table
 */
export class CreateUsersAndThreads1760000000000 implements MigrationInterface {
  name = 'CreateUsersAndThreads1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "users" (
        "id" varchar(36) NOT NULL,
        "username" varchar(32) NOT NULL,
        "displayName" varchar(100) NOT NULL,
        "email" varchar(255),
        "emailVerified" boolean NOT NULL DEFAULT false,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users_id" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_users_username" UNIQUE ("username")
      );
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_users_username" ON "users" ("username");`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "threads" (
        "id" varchar(36) NOT NULL,
        "kind" varchar(16) NOT NULL,
        "participantKey" varchar(160) NOT NULL,
        "participantAId" varchar(36) NOT NULL,
        "participantBId" varchar(36) NOT NULL,
        "subjectId" varchar(64),
        "isActive" boolean NOT NULL DEFAULT true,
        "messageCount" integer NOT NULL DEFAULT 0,
        "createdAt" TIMESTAMP NOT NULL,
        "lastActivityAt" TIMESTAMP NOT NULL,
        CONSTRAINT "PK_threads_id" PRIMARY KEY ("id")
      );
    `);
    // At most one active thread per participant combination; archived ones keep their key
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS "UQ_threads_active_participantKey" ON "threads" ("participantKey") WHERE "isActive" = true;`
    );
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_threads_participantKey" ON "threads" ("participantKey");`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_threads_participantAId" ON "threads" ("participantAId");`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_threads_participantBId" ON "threads" ("participantBId");`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_threads_lastActivityAt" ON "threads" ("lastActivityAt");`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "messages" (
        "id" varchar(36) NOT NULL,
        "threadId" varchar(36) NOT NULL,
        "senderId" varchar(36) NOT NULL,
        "body" text NOT NULL,
        "createdAt" TIMESTAMP NOT NULL,
        "readAt" TIMESTAMP,
        CONSTRAINT "PK_messages_id" PRIMARY KEY ("id"),
        CONSTRAINT "FK_messages_threadId" FOREIGN KEY ("threadId")
          REFERENCES "threads"("id") ON DELETE CASCADE
      );
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "IDX_messages_threadId_createdAt" ON "messages" ("threadId", "createdAt");`
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "IDX_messages_threadId_senderId_readAt" ON "messages" ("threadId", "senderId", "readAt");`
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "messages";`);
    await queryRunner.query(`DROP TABLE IF EXISTS "threads";`);
  }
}
