#!/usr/bin/env node
/**
 * variant-dispatch entry point.
 *
 *   publish   uniqueize one source and schedule it to the given accounts
 *   accounts  list connected SmmBox accounts grouped by platform
 *   probe     report the encoder backend this machine would use
 *   sweep     delete temp files older than TEMP_RETENTION_HOURS
 *   server    long-running mode: hourly temp sweep via node-cron
 */
import { parseArgs } from 'util';
import cron from 'node-cron';
import { ENCODER } from './config.js';
import { NoEncoderAvailableError, ValidationError, errorMessage } from './errors.js';
import { sendAlert } from './monitoring/telegram.js';
import { sweepTempDir } from './pipeline/cleanup.js';
import { createDefaultDependencies, getEncoderCapability } from './pipeline/dependencies.js';
import { runPublishBatch, type PublishBatchRequest } from './pipeline/index.js';
import type { AccountTarget } from './pipeline/types.js';
import { SmmBoxAccountRegistry, parseAccountRef } from './platforms/registry.js';
import { SmmBoxClient } from './platforms/smmbox.js';
import { logger } from './utils/logger.js';

const USAGE = `Usage:
  variant-dispatch publish --source <path> | --source-handle <key>
                           --at <ISO-8601 time, Moscow when no offset>
                           (--account <platform>:<type>:<id> ... | --all-accounts)
                           [--caption <text>] [--seed <seed>]
  variant-dispatch accounts
  variant-dispatch probe
  variant-dispatch sweep
  variant-dispatch server`;

// ── Commands ──────────────────────────────────────────────────────────────────

async function publishCommand(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      'source':        { type: 'string' },
      'source-handle': { type: 'string' },
      'at':            { type: 'string' },
      'account':       { type: 'string', multiple: true },
      'all-accounts':  { type: 'boolean', default: false },
      'caption':       { type: 'string' },
      'seed':          { type: 'string' },
    },
  });

  let targets: AccountTarget[];
  if (values['all-accounts']) {
    const groups = await new SmmBoxAccountRegistry(new SmmBoxClient()).listAccounts();
    targets = groups.flatMap(g => g.accounts);
  } else {
    targets = (values.account ?? []).map(parseAccountRef);
  }

  const handle = values['source-handle'];
  const request: PublishBatchRequest = {
    source:      handle ? { handle } : values.source ?? '',
    targets,
    scheduledAt: values.at ?? '',
    caption:     values.caption,
    seed:        values.seed,
  };

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupt received — finishing in-flight work, starting nothing new');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await runPublishBatch(request, createDefaultDependencies(), { signal: controller.signal });
    process.stdout.write(JSON.stringify(result, null, 2) + '\n');
    return result.failures.length ? 2 : 0;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

async function accountsCommand(): Promise<number> {
  const groups = await new SmmBoxAccountRegistry(new SmmBoxClient()).listAccounts();
  process.stdout.write(JSON.stringify(groups, null, 2) + '\n');
  return 0;
}

async function probeCommand(): Promise<number> {
  const selection = await getEncoderCapability().selection();
  process.stdout.write(JSON.stringify({ preference: ENCODER.preference, ...selection }, null, 2) + '\n');
  return selection.primary ? 0 : 1;
}

async function sweepCommand(): Promise<number> {
  const removed = await sweepTempDir();
  process.stdout.write(`Removed ${removed} entr${removed === 1 ? 'y' : 'ies'}\n`);
  return 0;
}

function startServer(): void {
  cron.schedule('0 * * * *', async () => {
    logger.info('Cron: triggering temp sweep');
    await sweepTempDir().catch((err: unknown) => {
      logger.error('Cron: sweep error', { error: errorMessage(err) });
    });
  });
  logger.info('Cron: schedules registered');
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command, ...rest] = process.argv;

async function main(): Promise<number> {
  switch (command) {
    case 'publish':  return publishCommand(rest);
    case 'accounts': return accountsCommand();
    case 'probe':    return probeCommand();
    case 'sweep':    return sweepCommand();
    case 'server':
      startServer();
      await sendAlert('variant-dispatch server started.', 'info');
      logger.info('variant-dispatch: server mode running');
      return -1;
    default:
      process.stderr.write(`${USAGE}\n`);
      return command === undefined || command === 'help' ? 0 : 1;
  }
}

main()
  .then((code) => {
    // Server mode keeps the process alive on the cron timer.
    if (code >= 0) process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof ValidationError) {
      logger.error('Invalid request', { issues: err.issues });
    } else if (err instanceof NoEncoderAvailableError) {
      logger.error('No encoder available', { tried: err.tried });
    } else {
      logger.error('Fatal error', { error: errorMessage(err) });
    }
    process.exitCode = 1;
  });
