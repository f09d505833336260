import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Adds the unread-message reminder settings to users.
 */
export class AddUnreadReminderSettings1760100000000 implements MigrationInterface {
  name = 'AddUnreadReminderSettings1760100000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      ALTER TABLE "users"
        ADD COLUMN IF NOT EXISTS "unreadReminderEnabled" boolean NOT NULL DEFAULT false,
        ADD COLUMN IF NOT EXISTS "unreadReminderDelayMin" integer NOT NULL DEFAULT 60,
        ADD COLUMN IF NOT EXISTS "lastUnreadReminderSentAt" TIMESTAMP,
        ADD COLUMN IF NOT EXISTS "reminderClaimedUntil" TIMESTAMP;
    `);
    await queryRunner.query(`
      DO $$ BEGIN
        ALTER TABLE "users" ADD CONSTRAINT "CHK_users_unreadReminderDelayMin"
          CHECK ("unreadReminderDelayMin" IN (30, 60, 180));
      EXCEPTION
        WHEN duplicate_object THEN null;
      END $$;
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`ALTER TABLE "users" DROP CONSTRAINT IF EXISTS "CHK_users_unreadReminderDelayMin";`);
    await queryRunner.query(`
      ALTER TABLE "users"
        DROP COLUMN IF EXISTS "reminderClaimedUntil",
        DROP COLUMN IF EXISTS "lastUnreadReminderSentAt",
        DROP COLUMN IF EXISTS "unreadReminderDelayMin",
        DROP COLUMN IF EXISTS "unreadReminderEnabled";
    `);
  }
}
