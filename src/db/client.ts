/**
 * Database client: Supabase primary, SQLite local fallback.
 *
 * When Supabase is unreachable, inserts are queued in a local SQLite file and
 * replayed by syncPendingToSupabase() once a later write goes through.
 */
import { mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type Database from 'better-sqlite3';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { sendAlert } from '../monitoring/telegram.js';

// ─── Supabase singleton ───────────────────────────────────────────────────────

let _supabase: SupabaseClient | null = null;
let supabaseDown = false;

export function getSupabase(): SupabaseClient {
  if (!_supabase) {
    _supabase = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY, {
      auth: { persistSession: false },
    });
  }
  return _supabase;
}

// ─── Connection error detection ───────────────────────────────────────────────

export function isConnError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.message.includes('ECONNREFUSED') ||
      err.message.includes('fetch failed') ||
      err.message.includes('network timeout') ||
      err.message.includes('ETIMEDOUT'))
  );
}

// ─── Inserts ──────────────────────────────────────────────────────────────────

export type Row = Record<string, unknown>;

/**
 * Insert rows into `table`. On a connection failure the rows are queued in
 * SQLite and the call resolves with `{ queued: true }`.
 */
export async function dbInsertMany(table: string, rows: Row[]): Promise<{ queued: boolean }> {
  if (!rows.length) return { queued: false };
  try {
    const { error } = await getSupabase().from(table).insert(rows);
    if (error) throw new Error(error.message);
    if (supabaseDown) {
      supabaseDown = false;
      void syncPendingToSupabase().catch((err: unknown) => {
        logger.warn('Sync after recovery failed', { err });
      });
    }
    return { queued: false };
  } catch (err) {
    if (!isConnError(err)) throw err;
    if (!supabaseDown) {
      supabaseDown = true;
      await sendAlert('Supabase down — publish ledger writing to SQLite fallback.', 'warning');
    }
    await localInsert(table, rows);
    return { queued: true };
  }
}

// ─── SQLite fallback ──────────────────────────────────────────────────────────

let _localDb: Database.Database | null = null;

export function fallbackDbPath(): string {
  return join(process.env['HOME'] ?? '/tmp', '.variant-dispatch', 'local_fallback.db');
}

export async function getDb(): Promise<Database.Database> {
  if (!_localDb) {
    const { default: SQLite } = await import('better-sqlite3');
    const dbPath = fallbackDbPath();
    mkdirSync(dirname(dbPath), { recursive: true });
    _localDb = new SQLite(dbPath);
    _localDb.exec(`
      CREATE TABLE IF NOT EXISTS pending_sync (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        table_name  TEXT    NOT NULL,
        record_data TEXT    NOT NULL,
        created_at  TEXT    NOT NULL DEFAULT (datetime('now'))
      )
    `);
  }
  return _localDb;
}

async function localInsert(table: string, rows: Row[]): Promise<void> {
  logger.warn('Writing INSERT to SQLite fallback', { table, rows: rows.length });
  const db = await getDb();
  const stmt = db.prepare('INSERT INTO pending_sync (table_name, record_data) VALUES (?, ?)');
  db.transaction((batch: Row[]) => {
    for (const row of batch) stmt.run(table, JSON.stringify(row));
  })(rows);
}

// ─── Sync recovery ────────────────────────────────────────────────────────────

interface PendingRow {
  id: number;
  table_name: string;
  record_data: string;
}

function isPendingRow(v: unknown): v is PendingRow {
  return (
    typeof v === 'object' && v !== null &&
    'id' in v && typeof v.id === 'number' &&
    'table_name' in v && typeof v.table_name === 'string' &&
    'record_data' in v && typeof v.record_data === 'string'
  );
}

export async function syncPendingToSupabase(): Promise<void> {
  const db = await getDb();
  const pending = db.prepare('SELECT id, table_name, record_data FROM pending_sync ORDER BY id ASC')
    .all()
    .filter(isPendingRow);

  if (!pending.length) return;

  logger.info(`Syncing ${pending.length} local SQLite record(s) to Supabase`);

  for (const row of pending) {
    try {
      const payload: unknown = JSON.parse(row.record_data);
      const { error } = await getSupabase().from(row.table_name).upsert(payload);
      if (error) throw new Error(error.message);
      db.prepare('DELETE FROM pending_sync WHERE id = ?').run(row.id);
    } catch (err) {
      // Left in the queue for the next recovery cycle.
      logger.warn('Sync retry failed — will retry on next recovery', {
        id: row.id,
        table: row.table_name,
        err,
      });
    }
  }

  const remaining = db.prepare('SELECT id FROM pending_sync').all().length;
  if (remaining === 0) {
    logger.info('SQLite sync queue fully drained — Supabase is current');
  } else {
    logger.warn(`${remaining} record(s) still pending sync`);
  }
}
