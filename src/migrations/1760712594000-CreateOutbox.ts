import { MigrationInterface } from 'typeorm';
import {
  CREATE_SET_UPDATED_AT_FUNCTION,
  DROP_SET_UPDATED_AT_FUNCTION,
  createUpdatedAtTrigger,
  dropUpdatedAtTrigger,
  SqlRunner,
} from './updated-at-trigger';

export class CreateOutbox1760712594000 implements MigrationInterface {
  name = 'CreateOutbox1760712594000';

  public async up(queryRunner: SqlRunner): Promise<void> {
    await queryRunner.query(CREATE_SET_UPDATED_AT_FUNCTION);

    await queryRunner.query(`CREATE TABLE "outbox" (
  "id" SERIAL PRIMARY KEY,
  "event_type" TEXT NOT NULL,
  "payload" TEXT NOT NULL,
  "status" TEXT NOT NULL DEFAULT 'PENDING',
  "created_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  "updated_at" TIMESTAMPTZ NOT NULL DEFAULT NOW()
)`);
    await queryRunner.query(createUpdatedAtTrigger('outbox'));
  }

  public async down(queryRunner: SqlRunner): Promise<void> {
    await queryRunner.query(dropUpdatedAtTrigger('outbox'));
    await queryRunner.query(`DROP TABLE IF EXISTS "outbox"`);
    await queryRunner.query(DROP_SET_UPDATED_AT_FUNCTION);
  }
}
