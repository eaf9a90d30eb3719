#!/usr/bin/env tsx
/**
 * Pre-flight check: env vars, ffmpeg/ffprobe on PATH, the encoder probe,
 * the transform bounds file and the Supabase connection.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0  all required checks pass
 *   1  one or more required checks failed
 */
import { execFile } from 'child_process';
import { resolve } from 'path';
import { promisify } from 'util';
import { createClient } from '@supabase/supabase-js';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

const execFileAsync = promisify(execFile);

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

let anyRequiredFailed = false;

function checkRequired(label: string, value: string | undefined, hint?: string): void {
  if (value && value.trim().length > 0) {
    // Mask secrets: first 6 chars only
    const display = value.length > 10 ? `${value.slice(0, 6)}…` : '(set)';
    pass(label, display);
  } else {
    fail(label, hint ?? `Set ${label} in .env`);
    anyRequiredFailed = true;
  }
}

function checkOptional(label: string, value: string | undefined, defaultVal: string): void {
  console.log(`  ${YELLOW}○${RESET} ${label}  ${value ?? defaultVal}${value ? '' : '  (default)'}`);
}

// ── [1] Environment ───────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== variant-dispatch — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Required environment variables${RESET}`);

checkRequired('SMMBOX_API_TOKEN',     process.env['SMMBOX_API_TOKEN'],     'SmmBox → settings → API token');
checkRequired('SUPABASE_URL',         process.env['SUPABASE_URL'],         'Supabase project settings → API');
checkRequired('SUPABASE_SERVICE_KEY', process.env['SUPABASE_SERVICE_KEY'], 'Supabase project settings → API → service_role key');

console.log(`\n${BOLD}[ 2 ] Optional / configuration variables${RESET}`);

checkOptional('SMMBOX_API_URL',         process.env['SMMBOX_API_URL'],         'https://smmbox.com/api/');
checkOptional('STORAGE_BUCKET',         process.env['STORAGE_BUCKET'],         'variants');
checkOptional('ENCODER_PREFERENCE',     process.env['ENCODER_PREFERENCE'],     'nvenc,qsv,amf,videotoolbox');
checkOptional('ALLOW_SOFTWARE_ENCODER', process.env['ALLOW_SOFTWARE_ENCODER'], 'false');
checkOptional('ENCODER_SESSIONS',       process.env['ENCODER_SESSIONS'],       '1');
checkOptional('PUBLISH_CONCURRENCY',    process.env['PUBLISH_CONCURRENCY'],    '4');
checkOptional('PUBLISH_MAX_ATTEMPTS',   process.env['PUBLISH_MAX_ATTEMPTS'],   '3');
checkOptional('TEMP_DIR',               process.env['TEMP_DIR'],               '/tmp/variant-dispatch');
checkOptional('TELEGRAM_BOT_TOKEN',     process.env['TELEGRAM_BOT_TOKEN'] ? '(set)' : undefined, '(alerts disabled)');

// ── [3] Media tools ───────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] ffmpeg / ffprobe${RESET}`);

for (const bin of ['ffmpeg', 'ffprobe']) {
  try {
    const { stdout } = await execFileAsync(bin, ['-version'], { timeout: 10_000 });
    pass(bin, stdout.split('\n')[0] ?? '');
  } catch {
    fail(`${bin} not found on PATH`, 'Install ffmpeg with the hardware encoders for this machine');
    anyRequiredFailed = true;
  }
}

// ── [4] Encoder + bounds (need a valid env) ───────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Encoder backend and transform bounds${RESET}`);

if (anyRequiredFailed) {
  console.log(`  ${YELLOW}○${RESET} skipped — fix the failures above first`);
} else {
  try {
    const { env, loadTransformBounds } = await import('../src/config.js');
    const file = resolve(process.cwd(), env.TRANSFORM_BOUNDS_PATH || 'config/transform-bounds.json');
    loadTransformBounds(file);
    pass('transform bounds', file);

    const { EncoderCapability } = await import('../src/media/encoder-capability.js');
    const { nodeToolchain } = await import('../src/media/ffmpeg.js');
    const selection = await new EncoderCapability(nodeToolchain).selection();
    if (selection.primary) {
      pass('encoder backend', `${selection.primary.name} (${selection.primary.encoder})`);
      if (!selection.primary.hardware) {
        console.log(`  ${YELLOW}○${RESET} running on software encoding — expect slow batches`);
      }
    } else {
      fail('no usable encoder backend', `tried ${selection.tried.join(', ')}; set ALLOW_SOFTWARE_ENCODER=true to allow libx264`);
      anyRequiredFailed = true;
    }
  } catch (err) {
    fail('configuration check failed', err instanceof Error ? err.message : String(err));
    anyRequiredFailed = true;
  }
}

// ── [5] Supabase ──────────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 5 ] Supabase connection${RESET}`);

const supabaseUrl = process.env['SUPABASE_URL'];
const supabaseKey = process.env['SUPABASE_SERVICE_KEY'];

if (supabaseUrl && supabaseKey) {
  process.stdout.write(`  Testing Supabase connection… `);
  try {
    const sb = createClient(supabaseUrl, supabaseKey);
    const { error } = await sb.from('publish_posts').select('batch_id').limit(1);
    if (error && !error.message.includes('does not exist') && !error.message.includes('relation')) {
      throw new Error(error.message);
    }
    console.log(`${GREEN}✓${RESET}  connected`);
  } catch (err) {
    console.log(`${RED}✗${RESET}`);
    fail('Supabase connection failed', err instanceof Error ? err.message : String(err));
    anyRequiredFailed = true;
  }
} else {
  console.log(`  ${YELLOW}○${RESET} Supabase connection  (skipped — credentials missing above)`);
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}\n`);
}
