/**
 * Application
 *
 * Wires the bot together:
 * Homework API Client → Poll Loop → Notification Service → Telegram
 *
 * Startup refuses to go further when a credential is missing.
 */

import { logger } from './logger.js';
import { config } from './config.js';
import { MissingVariableError } from './errors.js';
import {
  checkCredentials,
  findMissingCredentials,
  type CredentialSlots,
  type Credentials,
} from './credentials.js';
import { HomeworkApiClient } from './homework/index.js';
import { NotificationService, TelegramClient } from './notification/index.js';
import { PollLoop } from './polling/index.js';

/**
 * Check the chat bot before polling. An unverified bot does not stop
 * startup: every later delivery failure is logged on its own.
 */
export async function verifyChatConnection(
  client: Pick<TelegramClient, 'verifyConnection'>
): Promise<boolean> {
  const verified = await client.verifyConnection();
  if (!verified) {
    logger.warn('Telegram bot could not be verified, notifications may not be delivered');
  }
  return verified;
}

export class App {
  private credentials: CredentialSlots;

  constructor(credentials: CredentialSlots = {
    practicumToken: config.practicum.token,
    telegramBotToken: config.telegram.botToken,
    telegramChatId: config.telegram.chatId,
  }) {
    this.credentials = credentials;
  }

  /**
   * Validate credentials, build the services and poll forever.
   * Rejects with MissingVariableError before polling when a credential is absent.
   */
  public async start(): Promise<void> {
    const credentials = this.credentials;
    if (!checkCredentials(credentials)) {
      throw new MissingVariableError(findMissingCredentials(credentials));
    }

    const loop = await this.createPollLoop(credentials);
    await loop.run();
  }

  private async createPollLoop(credentials: Credentials): Promise<PollLoop> {
    const telegramClient = new TelegramClient({
      botToken: credentials.telegramBotToken,
      chatId: credentials.telegramChatId,
      retryAttempts: config.telegram.retryAttempts,
      retryDelayMs: config.telegram.retryDelayMs,
    });

    await verifyChatConnection(telegramClient);

    const notificationService = new NotificationService(telegramClient);
    const apiClient = new HomeworkApiClient({
      endpoint: config.practicum.endpoint,
      token: credentials.practicumToken,
    });

    const loop = new PollLoop(
      {
        initialCursor: Math.floor(Date.now() / 1000),
        retryTimeMs: config.polling.retryTimeSeconds * 1000,
      },
      apiClient,
      notificationService
    );

    loop.on('cycle', (outcome, state) => {
      logger.debug('Poll cycle finished', {
        outcome: outcome.kind,
        cursor: state.cursor,
        homeworkId: state.currentHomeworkId,
      });
    });

    return loop;
  }
}
