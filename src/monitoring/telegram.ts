/**
 * Telegram operator alerts.
 *
 * All outbound messages are fire-and-forget (errors are logged, not thrown)
 * so a Telegram outage never blocks a batch. Without TELEGRAM_BOT_TOKEN and
 * TELEGRAM_CHAT_ID alerts are only logged.
 */
import { env } from '../config.js';
import type { AlertLevel, BatchResult, Notifier } from '../pipeline/types.js';
import { logger } from '../utils/logger.js';

const PREFIX: Record<AlertLevel, string> = {
  info:     'ℹ️',
  warning:  '⚠️',
  critical: '🚨',
};

export const escapeHtml = (s: string) =>
  s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

async function send(text: string): Promise<void> {
  const token = env.TELEGRAM_BOT_TOKEN;
  const chatId = env.TELEGRAM_CHAT_ID;
  if (!token || !chatId) {
    logger.debug('Telegram: not configured, alert skipped');
    return;
  }
  try {
    const res = await fetch(`https://api.telegram.org/bot${token}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: chatId, text, parse_mode: 'HTML' }),
    });
    if (!res.ok) {
      logger.warn('Telegram: sendMessage failed', { status: res.status });
    }
  } catch (err) {
    logger.warn('Telegram: unreachable', { error: String(err) });
  }
}

/** Send a plain alert at the specified level. */
export async function sendAlert(message: string, level: AlertLevel = 'info'): Promise<void> {
  await send(`${PREFIX[level]} <b>${level.toUpperCase()}</b>\n${escapeHtml(message)}`);
}

/** Operator summary of a finished batch; one line per failed account, capped. */
export function formatBatchSummary(batchId: string, result: BatchResult, maxLines = 20): string {
  const lines = [
    `Batch ${batchId}: ${result.published}/${result.totalAccounts} published, ${result.totalVideos} variant(s)`,
  ];
  for (const f of result.failures.slice(0, maxLines)) {
    lines.push(`• ${f.platform}:${f.accountId} ${f.reason}: ${f.message}`);
  }
  if (result.failures.length > maxLines) {
    lines.push(`… and ${result.failures.length - maxLines} more`);
  }
  return lines.join('\n');
}

export const telegramNotifier: Notifier = {
  alert: sendAlert,
};
