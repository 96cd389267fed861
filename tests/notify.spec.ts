import { describe, it, expect, vi, beforeEach } from 'vitest';

const { sendMessage, tokens } = vi.hoisted(() => ({
  sendMessage: vi.fn(async (_chatId: string, _text: string, _opts: { parse_mode: string }) => ({ message_id: 1 })),
  tokens: new Array<string>(),
}));
vi.mock('grammy', () => ({
  Api: class {
    constructor(token: string) { tokens.push(token); }
    sendMessage = sendMessage;
  },
}));

import { notifyReport, notifyTarget } from '../src/notify.js';
import { renderSummaryCard } from '../src/ui.js';
import { scenarioReport } from './helpers/scenario.js';

describe('telegram notify', () => {
  beforeEach(() => { sendMessage.mockClear(); tokens.length = 0; });

  it('sends the MarkdownV2 card to the configured chat', async () => {
    const report = await scenarioReport();
    expect(await notifyReport(report, { token: 'test-token', chatId: '42' })).toBe(true);
    expect(tokens).toEqual(['test-token']);
    const [chatId, text, opts] = sendMessage.mock.calls[0];
    expect(chatId).toBe('42');
    expect(text).toBe(renderSummaryCard(report));
    expect(opts.parse_mode).toBe('MarkdownV2');
  });

  it('skips without a target', async () => {
    expect(await notifyReport(await scenarioReport(), null)).toBe(false);
    expect(sendMessage).not.toHaveBeenCalled();
  });

  it('needs both token and chat id', () => {
    expect(notifyTarget({ TELEGRAM_BOT_TOKEN: 'test-token' })).toBeNull();
    expect(notifyTarget({ TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '42' })).toEqual({ token: 'test-token', chatId: '42' });
  });
});
