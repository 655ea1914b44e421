import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import configuration from '../config/configuration';
import { createDataSource } from '../data-source';

const envPath = path.resolve(__dirname, '../../.env');
dotenv.config({ path: fs.existsSync(envPath) ? envPath : undefined });

const logger = new Logger('Migrations');

async function runMigrations() {
  const dataSource = createDataSource(configuration().database);

  await dataSource.initialize();
  logger.log('Connected to database');

  try {
    const applied = await dataSource.runMigrations({ transaction: 'each' });
    for (const migration of applied) {
      logger.log(`Applied ${migration.name}`);
    }
    logger.log(`Ran ${applied.length} new migrations`);
  } finally {
    await dataSource.destroy();
  }
}

runMigrations().catch((error: unknown) => {
  logger.error('Migration failed', error instanceof Error ? error.stack : String(error));
  process.exitCode = 1;
});
