import fs from 'node:fs/promises';
import path from 'node:path';
import type { BaseLogger } from '../lib/logger.js';
import type { Queryable } from '../lib/model-store.js';

const MIGRATION_FILE = 'migration.sql';

async function pendingFolders(dir: string) {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));
}

async function readMigration(dir: string, folder: string) {
  try {
    return await fs.readFile(path.join(dir, folder, MIGRATION_FILE), 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}

// Runs every unapplied folder in one transaction; a failure rolls all of them back.
export async function applyMigrations(client: Queryable, dir: string, logger: BaseLogger) {
  const folders = await pendingFolders(dir);
  const applied: string[] = [];

  await client.query('BEGIN');
  try {
    await client.query(
      `create table if not exists schema_migrations (
         id text primary key,
         applied_at timestamptz not null default now()
       )`
    );

    for (const folder of folders) {
      const seen = await client.query('select 1 from schema_migrations where id = $1', [folder]);
      if ((seen.rowCount ?? 0) > 0) continue;

      const sql = await readMigration(dir, folder);
      if (sql === null) continue;

      logger.info({ migration: folder }, 'migration.applying');
      await client.query(sql);
      await client.query('insert into schema_migrations (id) values ($1) on conflict do nothing', [folder]);
      applied.push(folder);
    }

    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  }

  return applied;
}
