import { MigrationInterface } from 'typeorm';
import { createUpdatedAtTrigger, dropUpdatedAtTrigger, SqlRunner } from './updated-at-trigger';

// Parents first; down() walks this list backwards.
const TABLES = ['carts', 'cart_items', 'orders', 'payments'];

export class CreateOrderSchema1760715896000 implements MigrationInterface {
  name = 'CreateOrderSchema1760715896000';

  public async up(queryRunner: SqlRunner): Promise<void> {
    await queryRunner.query(`CREATE TABLE "carts" (
  "id" SERIAL PRIMARY KEY,
  "patient_id" INTEGER NOT NULL,
  "created_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  "updated_at" TIMESTAMPTZ NOT NULL DEFAULT NOW()
)`);

    await queryRunner.query(`CREATE TABLE "cart_items" (
  "cart_id" INTEGER NOT NULL,
  "product_id" INTEGER NOT NULL,
  "quantity" INTEGER NOT NULL DEFAULT 1,
  "created_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  "updated_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  FOREIGN KEY ("cart_id") REFERENCES "carts"("id") ON DELETE CASCADE,
  PRIMARY KEY ("cart_id", "product_id")
)`);

    await queryRunner.query(`CREATE TABLE "orders" (
  "id" SERIAL PRIMARY KEY,
  "cart_id" INTEGER NOT NULL,
  "patient_id" INTEGER NOT NULL,
  "status" TEXT NOT NULL DEFAULT 'PENDING',
  "order_type" TEXT NOT NULL DEFAULT 'PICKUP',
  "delivery_id" UUID,
  "delivery_address" JSONB,
  "created_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  "updated_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  "deleted_at" TIMESTAMPTZ,
  FOREIGN KEY ("cart_id") REFERENCES "carts"("id") ON DELETE CASCADE
)`);

    await queryRunner.query(`CREATE TABLE "payments" (
  "id" UUID PRIMARY KEY DEFAULT gen_random_uuid(),
  "order_id" INTEGER NOT NULL,
  "amount" REAL NOT NULL,
  "status" VARCHAR(32) NOT NULL DEFAULT 'PENDING',
  "provider" VARCHAR(64) NOT NULL DEFAULT 'internal',
  "provider_ref" VARCHAR(128),
  "failure_reason" TEXT,
  "created_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  "updated_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  FOREIGN KEY ("order_id") REFERENCES "orders"("id") ON DELETE CASCADE
)`);

    for (const table of TABLES) {
      await queryRunner.query(createUpdatedAtTrigger(table));
    }
  }

  public async down(queryRunner: SqlRunner): Promise<void> {
    for (const table of [...TABLES].reverse()) {
      await queryRunner.query(dropUpdatedAtTrigger(table));
      await queryRunner.query(`DROP TABLE IF EXISTS "${table}"`);
    }
  }
}
