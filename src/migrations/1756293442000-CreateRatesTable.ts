import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateRatesTable1756293442000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "rates" (
        "id" SERIAL NOT NULL,
        "pair" VARCHAR(10) NOT NULL,
        "price" NUMERIC(20, 8) NOT NULL,
        "recorded_at" TIMESTAMPTZ NOT NULL,
        "created_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_rates_id" PRIMARY KEY ("id"),
        CONSTRAINT "uq_rates_pair_recorded_at" UNIQUE ("pair", "recorded_at")
      )
    `);

    // Range scans per pair
    await queryRunner.query(
      `CREATE INDEX "idx_pair_recorded_at" ON "rates" ("pair", "recorded_at")`,
    );
    // Retention sweeps
    await queryRunner.query(
      `CREATE INDEX "idx_recorded_at" ON "rates" ("recorded_at")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "idx_recorded_at"`);
    await queryRunner.query(`DROP INDEX "idx_pair_recorded_at"`);
    await queryRunner.query(`DROP TABLE "rates"`);
  }
}
