/**
 * One-time database schema setup (run when starting from scratch).
 * Runs schema/init.sql to create tables and indexes.
 */

import fs from 'fs';
import { Pool } from 'pg';
import { config, logger } from '@finspread/shared';
import { findSchemaFile } from './lib/schema-file';

const pool = new Pool({
  connectionString: config.databaseUrl,
});

async function runInitSchema(): Promise<void> {
  const client = await pool.connect();

  try {
    logger.info('Running database schema (init.sql)');

    const schemaPath = findSchemaFile();
    logger.info('Applying schema file', { schema_path: schemaPath });
    await client.query(fs.readFileSync(schemaPath, 'utf-8'));

    logger.info('Database schema complete');
  } catch (error) {
    logger.error('Schema init failed', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

runInitSchema()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
