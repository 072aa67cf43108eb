/**
 * Database Setup Script
 * Applies db/schema.sql to the configured database.
 */

import 'dotenv/config';
import { Pool } from 'pg';
import { readFileSync } from 'fs';
import { join } from 'path';
import { loadConfig } from '../config';
import { describeError } from '../errors';

async function setupDatabase(): Promise<void> {
  const config = loadConfig();
  console.log('[DB Setup] Using', config.databaseUrl.replace(/:[^:@]+@/, ':****@'));
  const pool = new Pool({ connectionString: config.databaseUrl });

  try {
    const schema = readFileSync(join(__dirname, '../../db/schema.sql'), 'utf-8');
    // Run as one script so dollar-quoted blocks survive
    await pool.query(schema);

    const tables = await pool.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      ORDER BY table_name
    `);
    console.log('[DB Setup] Tables:', tables.rows.map(row => row.table_name).join(', '));
  } finally {
    await pool.end();
  }
}

setupDatabase()
  .then(() => {
    console.log('[DB Setup] Complete');
  })
  .catch(error => {
    console.error('[DB Setup] Failed', { error: describeError(error) });
    process.exit(1);
  });
