/**
 * Message Formatter
 *
 * Fixed texts sent to the chat and written to the log.
 */

import { describeCause } from '../errors.js';

/** Sent ahead of every notification */
export const ATTENTION_MESSAGE = 'Attention ⚠️ Important news 📨';

export const STATUSES_NOT_CHANGED = 'Homework statuses have not changed.';

/**
 * Describe a failed poll cycle, for both the log and the chat
 */
export function formatFailureMessage(error: unknown): string {
  return `Program failure: ${sentence(error)}.`;
}

export function formatSentMessage(message: string): string {
  return `Message "${message}" sent to Telegram.`;
}

export function formatDeliveryFailure(error: unknown): string {
  return `Failed to send message to Telegram: ${sentence(error)}.`;
}

/** Error text without its final period, to be embedded in a sentence */
function sentence(error: unknown): string {
  return describeCause(error).replace(/\.$/, '');
}
