import fs from 'fs';
import path from 'path';
import { pool } from './database';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

async function migrate(): Promise<void> {
  const migrationsDir = path.resolve(process.cwd(), 'migrations');
  const files = fs.readdirSync(migrationsDir).filter((f) => f.endsWith('.sql')).sort();

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
      logger.info(`Skipping ${file} (already applied)`);
      continue;
    }

    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf8');
    logger.info(`Running ${file}`);
    await pool.query(sql);
    await pool.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
    logger.info(`Applied ${file}`);
  }

  logger.info('All migrations complete');
  await pool.end();
}

migrate().catch((err: unknown) => {
  logger.error('Migration failed', { error: toError(err).message });
  process.exit(1);
});
