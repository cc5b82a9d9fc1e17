/**
 * Telegram Client
 *
 * Handles communication with Telegram Bot API.
 * Includes retry logic and rate limit handling.
 */

import TelegramBot from 'node-telegram-bot-api';
import { logger, maskSecret } from '../logger.js';
import { NotificationDeliveryError } from '../errors.js';
import type { ChatSender, TelegramClientConfig } from './types.js';

/** The part of the bot API this client talks to */
export type TelegramBotApi = Pick<TelegramBot, 'sendMessage' | 'getMe'>;

export class TelegramClient implements ChatSender {
  private bot: TelegramBotApi;
  private chatId: string;
  private retryAttempts: number;
  private retryDelayMs: number;

  constructor(config: TelegramClientConfig, bot?: TelegramBotApi) {
    this.bot = bot ?? new TelegramBot(config.botToken);
    this.chatId = config.chatId;
    this.retryAttempts = Math.max(1, config.retryAttempts);
    this.retryDelayMs = config.retryDelayMs;

    logger.info('Telegram client initialized', {
      chatId: maskSecret(config.chatId),
    });
  }

  /**
   * Send a plain-text message with retry logic.
   * Rejects with NotificationDeliveryError once every attempt failed.
   */
  public async sendMessage(text: string): Promise<void> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        await this.bot.sendMessage(this.chatId, text, {
          disable_web_page_preview: true,
        });

        logger.debug('Telegram message sent successfully', { attempt });
        return;
      } catch (error) {
        lastError = error;

        if (attempt >= this.retryAttempts) {
          break;
        }

        // Check if it's a rate limit error
        if (this.isRateLimitError(error)) {
          const waitTime = this.extractRetryAfter(error) ?? this.retryDelayMs * attempt;
          logger.warn('Telegram rate limit hit, waiting...', {
            attempt,
            waitTime,
          });
          await this.sleep(waitTime);
        } else {
          logger.warn('Telegram send failed, retrying...', {
            attempt,
            error: error instanceof Error ? error.message : String(error),
          });
          await this.sleep(this.retryDelayMs * attempt);
        }
      }
    }

    throw new NotificationDeliveryError(lastError);
  }

  /**
   * Verify the bot token is valid
   */
  public async verifyConnection(): Promise<boolean> {
    try {
      const me = await this.bot.getMe();
      logger.info('Telegram bot verified', {
        username: me.username,
      });
      return true;
    } catch (error) {
      logger.error('Failed to verify Telegram bot', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Check if error is a rate limit (429) error
   */
  private isRateLimitError(error: unknown): boolean {
    if (error && typeof error === 'object' && 'response' in error) {
      const response = (error as { response?: { statusCode?: number } }).response;
      return response?.statusCode === 429;
    }
    return false;
  }

  /**
   * Extract retry_after value from rate limit error
   */
  private extractRetryAfter(error: unknown): number | null {
    if (error && typeof error === 'object' && 'response' in error) {
      const response = (error as { response?: { body?: { parameters?: { retry_after?: number } } } }).response;
      const retryAfter = response?.body?.parameters?.retry_after;
      if (retryAfter) {
        return retryAfter * 1000; // Convert to milliseconds
      }
    }
    return null;
  }

  /**
   * Sleep for specified milliseconds
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
