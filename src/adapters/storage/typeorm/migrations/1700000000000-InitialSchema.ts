import { MigrationInterface, QueryRunner } from 'typeorm';
import { formatUtcTimestamp } from '../../../../core';

/**
 * Relay state schema
 *
 * Uses IF NOT EXISTS throughout so it also adopts a database file created
 * before migrations were tracked, adding the columns such files may lack.
 */
export class InitialSchema1700000000000 implements MigrationInterface {
  name = 'InitialSchema1700000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "processed" (
        "source_id" integer NOT NULL,
        "message_id" integer NOT NULL,
        "created_at" text,
        PRIMARY KEY ("source_id", "message_id")
      )
    `);
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "channels" (
        "source_id" integer PRIMARY KEY NOT NULL,
        "name" text
      )
    `);
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "duplicate_codes" (
        "code" text PRIMARY KEY NOT NULL,
        "created_at" text
      )
    `);
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "url_filters" (
        "id" integer PRIMARY KEY AUTOINCREMENT NOT NULL,
        "pattern" text NOT NULL,
        "replacement" text NOT NULL DEFAULT (''),
        "sort_order" integer NOT NULL DEFAULT (0)
      )
    `);

    if (!(await queryRunner.hasColumn('processed', 'created_at'))) {
      await queryRunner.query(`ALTER TABLE "processed" ADD COLUMN "created_at" text`);
      // Rows of unknown age start their retention window now
      await queryRunner.query(
        `UPDATE "processed" SET "created_at" = ? WHERE "created_at" IS NULL`,
        [formatUtcTimestamp(new Date())],
      );
    }

    if (!(await queryRunner.hasColumn('url_filters', 'sort_order'))) {
      await queryRunner.query(
        `ALTER TABLE "url_filters" ADD COLUMN "sort_order" integer NOT NULL DEFAULT (0)`,
      );
      await queryRunner.query(
        `UPDATE "url_filters" SET "sort_order" = "id" WHERE "sort_order" IS NULL OR "sort_order" = 0`,
      );
    }

    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "IDX_processed_created_at" ON "processed" ("created_at")`,
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "IDX_url_filters_sort_order" ON "url_filters" ("sort_order")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX IF EXISTS "IDX_url_filters_sort_order"`);
    await queryRunner.query(`DROP INDEX IF EXISTS "IDX_processed_created_at"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "url_filters"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "duplicate_codes"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "channels"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "processed"`);
  }
}
