import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { createLogger } from '../lib/logger.js';
import { applyMigrations } from './migrations.js';
import { createPool } from './pool.js';

const logger = createLogger();
const migrationsDir = fileURLToPath(new URL('../../migrations', import.meta.url));

async function run() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    logger.error('migration.missing_database_url');
    process.exitCode = 1;
    return;
  }

  const pool = createPool(databaseUrl);
  const client = await pool.connect();
  try {
    const applied = await applyMigrations(client, migrationsDir, logger);
    logger.info({ applied }, 'migration.complete');
  } catch (err) {
    logger.error({ err }, 'migration.failed');
    process.exitCode = 1;
  } finally {
    client.release();
    await pool.end();
  }
}

await run();
