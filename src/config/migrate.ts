import fs from 'fs';
import path from 'path';
import { pool } from './database';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const MIGRATIONS_DIR = path.join(__dirname, '../../migrations');

async function applyMigration(file: string): Promise<void> {
  const sql = fs.readFileSync(path.join(MIGRATIONS_DIR, file), 'utf8');
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

async function migrate(): Promise<void> {
  const files = fs.readdirSync(MIGRATIONS_DIR).filter((f) => f.endsWith('.sql')).sort();

  await pool.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  for (const file of files) {
    const applied = await pool.query('SELECT 1 FROM _migrations WHERE name = $1', [file]);
    if (applied.rows.length > 0) {
      logger.info('Skipping migration (already applied)', { file });
      continue;
    }

    logger.info('Applying migration', { file });
    await applyMigration(file);
    logger.info('Migration applied', { file });
  }

  logger.info('All migrations complete', { count: files.length });
  await pool.end();
}

migrate().catch((error) => {
  logger.error('Migration failed', { error: errorMessage(error) });
  process.exit(1);
});
