/**
 * Tests for application startup
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { App, verifyChatConnection } from '../src/app.js';
import { logger } from '../src/logger.js';
import { MissingVariableError } from '../src/errors.js';

describe('App', () => {
  it('should refuse to start when a credential is missing', async () => {
    const app = new App({
      practicumToken: 'test-practicum-token',
      telegramBotToken: undefined,
      telegramChatId: '',
    });

    const start = app.start();

    await expect(start).rejects.toBeInstanceOf(MissingVariableError);
    await expect(start).rejects.toMatchObject({
      variables: ['TELEGRAM_BOT_TOKEN', 'TELEGRAM_CHAT_ID'],
      message:
        'Missing required environment variables: TELEGRAM_BOT_TOKEN, TELEGRAM_CHAT_ID. Bot launch stopped.',
    });
  });
});

describe('verifyChatConnection', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should warn when the bot cannot be verified', async () => {
    const warnSpy = vi.spyOn(logger, 'warn');

    const verified = await verifyChatConnection({
      verifyConnection: vi.fn().mockResolvedValue(false),
    });

    expect(verified).toBe(false);
    expect(warnSpy).toHaveBeenCalledWith(
      'Telegram bot could not be verified, notifications may not be delivered'
    );
  });

  it('should stay quiet when the bot answers', async () => {
    const warnSpy = vi.spyOn(logger, 'warn');

    await expect(
      verifyChatConnection({ verifyConnection: vi.fn().mockResolvedValue(true) })
    ).resolves.toBe(true);
    expect(warnSpy).not.toHaveBeenCalled();
  });
});
