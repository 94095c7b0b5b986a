// =============================================================================
// WARDEN — Schema Migration
// =============================================================================

import { readFile } from 'fs/promises';
import path from 'path';
import { Queryable } from '../services/store/postgres';

// Resolves from both src/db and dist/db
export const SCHEMA_PATH = path.resolve(__dirname, '../../src/db/schema.sql');

/** Apply db/schema.sql. Every statement is idempotent. */
export async function migrate(db: Queryable, schemaPath: string = SCHEMA_PATH): Promise<void> {
  const sql = await readFile(schemaPath, 'utf-8');
  await db.query(sql);
  console.log('[DB] Schema applied');
}
