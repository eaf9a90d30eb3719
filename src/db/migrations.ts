/**
 * SQL migration runner. Files in migrations/ run in name order (001, 002, …);
 * the names of applied files are tracked so a re-run only applies new ones.
 */
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface MigrationTarget {
  /** Names already applied; empty when the tracking table is missing. */
  applied(): Promise<Set<string>>;
  execute(sql: string): Promise<void>;
  markApplied(name: string): Promise<void>;
}

export interface MigrationReport {
  applied: string[];
  skipped: string[];
  failed: Array<{ name: string; error: string }>;
}

export function listMigrations(dir: string): string[] {
  return readdirSync(dir).filter(f => f.endsWith('.sql')).sort();
}

/** Every failure is collected so one run reports all of them. */
export async function runMigrations(dir: string, target: MigrationTarget): Promise<MigrationReport> {
  const done = await target.applied();
  const report: MigrationReport = { applied: [], skipped: [], failed: [] };

  for (const name of listMigrations(dir)) {
    if (done.has(name)) {
      report.skipped.push(name);
      continue;
    }
    try {
      await target.execute(readFileSync(join(dir, name), 'utf-8'));
      await target.markApplied(name);
      report.applied.push(name);
      logger.info('Migrations: applied', { name });
    } catch (err) {
      report.failed.push({ name, error: errorMessage(err) });
      logger.error('Migrations: failed', { name, error: errorMessage(err) });
    }
  }
  return report;
}
