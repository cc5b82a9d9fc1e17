/**
 * Startup credential check
 */

import { logger } from './logger.js';

export interface Credentials {
  practicumToken: string;
  telegramBotToken: string;
  telegramChatId: string;
}

export type CredentialSlots = { [K in keyof Credentials]: string | undefined };

/** Checked (and reported) in this order */
const CREDENTIAL_VARIABLES: ReadonlyArray<readonly [keyof Credentials, string]> = [
  ['practicumToken', 'PRACTICUM_TOKEN'],
  ['telegramBotToken', 'TELEGRAM_BOT_TOKEN'],
  ['telegramChatId', 'TELEGRAM_CHAT_ID'],
];

/**
 * Names of the environment variables whose slot is empty
 */
export function findMissingCredentials(slots: CredentialSlots): string[] {
  return CREDENTIAL_VARIABLES.filter(([slot]) => !slots[slot]).map(([, variable]) => variable);
}

/**
 * True when every credential is populated.
 * Otherwise logs one critical line naming the missing variables.
 */
export function checkCredentials(slots: CredentialSlots): slots is Credentials {
  const missing = findMissingCredentials(slots);
  if (missing.length > 0) {
    logger.log(
      'critical',
      `Missing required environment variables: ${missing.join(', ')}. The bot is stopped.`
    );
  }
  return missing.length === 0;
}
