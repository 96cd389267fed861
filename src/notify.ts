import { Api } from 'grammy';
import type { HealthReport } from './staking/schemas.js';
import { renderSummaryCard } from './ui.js';

export type NotifyTarget = { token: string; chatId: string };

export function notifyTarget(env: NodeJS.ProcessEnv = process.env): NotifyTarget | null {
  const token = env.TELEGRAM_BOT_TOKEN || '';
  const chatId = env.TELEGRAM_CHAT_ID || '';
  return token && chatId ? { token, chatId } : null;
}

/** Posts the summary card; no-op when Telegram is not configured. */
export async function notifyReport(report: HealthReport, target: NotifyTarget | null = notifyTarget()): Promise<boolean> {
  if (!target) {
    console.warn('[notify] TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID not set, skipping');
    return false;
  }
  const api = new Api(target.token);
  await api.sendMessage(target.chatId, renderSummaryCard(report), { parse_mode: 'MarkdownV2', link_preview_options: { is_disabled: true } });
  return true;
}
