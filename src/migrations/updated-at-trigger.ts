// Migrations only issue raw SQL; TypeORM's QueryRunner satisfies this
export interface SqlRunner {
  query(query: string): Promise<unknown>;
}

export const SET_UPDATED_AT_FUNCTION = 'set_updated_at';

export const CREATE_SET_UPDATED_AT_FUNCTION = `CREATE OR REPLACE FUNCTION ${SET_UPDATED_AT_FUNCTION}() RETURNS trigger AS $$
BEGIN
  NEW.updated_at := NOW();
  RETURN NEW;
END;
$$ LANGUAGE plpgsql`;

export const DROP_SET_UPDATED_AT_FUNCTION = `DROP FUNCTION IF EXISTS ${SET_UPDATED_AT_FUNCTION}()`;

/** Trigger that overwrites updated_at before every row update of `table`. */
export function createUpdatedAtTrigger(table: string): string {
  return `CREATE TRIGGER update_${table}_timestamp
BEFORE UPDATE ON "${table}"
FOR EACH ROW
EXECUTE FUNCTION ${SET_UPDATED_AT_FUNCTION}()`;
}

export function dropUpdatedAtTrigger(table: string): string {
  return `DROP TRIGGER IF EXISTS update_${table}_timestamp ON "${table}"`;
}
