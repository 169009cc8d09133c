import path from 'path';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { closeDatabase, getDb } from '../config/database';
import { logger } from '../utils/logger.util';

async function runMigrations(): Promise<void> {
  const migrationsFolder = path.join(process.cwd(), 'drizzle');
  logger.info('Running migrations', { migrationsFolder });
  await migrate(getDb(), { migrationsFolder });
  logger.info('Migrations completed successfully');
}

runMigrations()
  .then(() => closeDatabase())
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    logger.error('Migration failed', error);
    process.exit(1);
  });
