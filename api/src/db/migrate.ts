import fs from 'fs';
import path from 'path';
import type { Pool } from 'pg';
import type { ServiceContext } from '../services/context';
import { createGradeKey, parseBandDefinition } from '../services/gradeKeyService';

const SCHEMA_PATH = path.resolve(__dirname, '../../sql/schema.sql');

export const DEFAULT_GRADE_KEY_NAME = 'Default (86/72/58/44/20, 0.5er)';
export const PERCENT_DOMAIN = 100;

// label;lower;upper in percent, half-grade steps
export const DEFAULT_GRADE_KEY_DEFINITION = [
  '1.0;93;100',
  '1.5;86;93',
  '2.0;79;86',
  '2.5;72;79',
  '3.0;65;72',
  '3.5;58;65',
  '4.0;51;58',
  '4.5;44;51',
  '5.0;31.5;44',
  '5.5;19;31.5',
  '6.0;0;19',
].join('\n');

export async function applySchema(pool: Pool, ctx: ServiceContext): Promise<void> {
  const sql = fs.readFileSync(SCHEMA_PATH, 'utf8');
  await pool.query(sql);
  ctx.logger.info({ module: 'db.migrate', schema_path: SCHEMA_PATH }, 'Schema applied');
}

/** Seeds the default percentage key when no grade key exists yet. */
export async function seedDefaultGradeKey(ctx: ServiceContext): Promise<boolean> {
  const existing = await ctx.store.listGradeKeys();
  if (existing.length > 0) return false;

  await createGradeKey(ctx, DEFAULT_GRADE_KEY_NAME, parseBandDefinition(DEFAULT_GRADE_KEY_DEFINITION), PERCENT_DOMAIN);
  ctx.logger.info({ module: 'db.migrate', name: DEFAULT_GRADE_KEY_NAME }, 'Default grade key seeded');
  return true;
}
