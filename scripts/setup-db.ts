#!/usr/bin/env tsx
/**
 * Applies migrations/*.sql to Supabase through the exec_sql RPC, skipping
 * files already recorded in the _migrations table.
 * Run: npm run setup-db
 *
 * Exit codes:
 *   0  all migrations applied or already up to date
 *   1  one or more migrations failed
 */
import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { createClient } from '@supabase/supabase-js';
import { config as dotenvConfig } from 'dotenv';
import { runMigrations, type MigrationTarget } from '../src/db/migrations.js';

dotenvConfig();

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

// ── Config ────────────────────────────────────────────────────────────────────

const SUPABASE_URL         = process.env['SUPABASE_URL'];
const SUPABASE_SERVICE_KEY = process.env['SUPABASE_SERVICE_KEY'];

if (!SUPABASE_URL || !SUPABASE_SERVICE_KEY) {
  console.error(`${RED}SUPABASE_URL and SUPABASE_SERVICE_KEY must be set in .env${RESET}`);
  console.error(`Run ${YELLOW}npm run check-env${RESET} first to validate all required variables.`);
  process.exit(1);
}

const sb = createClient(SUPABASE_URL, SUPABASE_SERVICE_KEY, { auth: { persistSession: false } });
const migrationsDir = fileURLToPath(new URL('../migrations', import.meta.url));

const TRACKING_SQL = `
  CREATE TABLE IF NOT EXISTS _migrations (
    id         SERIAL PRIMARY KEY,
    name       TEXT NOT NULL UNIQUE,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`;

async function execSql(sql: string): Promise<void> {
  const { error } = await sb.rpc('exec_sql', { sql });
  if (error) throw new Error(error.message);
}

const supabaseTarget: MigrationTarget = {
  async applied() {
    const { data, error } = await sb.from('_migrations').select('name');
    if (error) {
      if (error.message.includes('does not exist')) return new Set<string>();
      throw new Error(`Could not query _migrations: ${error.message}`);
    }
    const names: string[] = [];
    for (const row of data ?? []) {
      if (typeof row.name === 'string') names.push(row.name);
    }
    return new Set(names);
  },
  execute: execSql,
  async markApplied(name) {
    const { error } = await sb.from('_migrations').insert({ name });
    if (error && !error.message.includes('duplicate')) {
      console.warn(`  ${YELLOW}could not record ${name}: ${error.message}${RESET}`);
    }
  },
};

// ── Main ──────────────────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== variant-dispatch — Database Setup ===${RESET}\n`);

if (!existsSync(migrationsDir)) {
  console.error(`${RED}migrations/ directory not found at ${migrationsDir}${RESET}`);
  process.exit(1);
}

try {
  await execSql(TRACKING_SQL);
} catch (err) {
  console.warn(`${YELLOW}Could not create _migrations via exec_sql: ${err instanceof Error ? err.message : String(err)}`);
  console.warn(`Tip: apply migrations with the Supabase CLI instead (supabase db push)${RESET}`);
}

const report = await runMigrations(migrationsDir, supabaseTarget);

for (const name of report.applied) console.log(`  ${GREEN}✓${RESET} ${name}`);
for (const name of report.skipped) console.log(`  ${YELLOW}○${RESET} ${name}  (already applied)`);
for (const { name, error } of report.failed) console.error(`  ${RED}✗${RESET} ${name}\n    ${error}`);

console.log('');
if (report.failed.length) {
  console.error(`${RED}${BOLD}Migration run had failures. Fix the errors above, then re-run.${RESET}\n`);
  process.exit(1);
}
console.log(`${GREEN}${BOLD}Database up to date.${RESET}\n`);
