/**
 * Types for Notification Service
 */

import type { HomeworkId } from '../homework/types.js';

/**
 * Telegram client configuration
 */
export interface TelegramClientConfig {
  botToken: string;
  chatId: string;
  retryAttempts: number;
  retryDelayMs: number;
}

/**
 * Capability to deliver a text to the configured recipient.
 * Rejects when the text could not be delivered.
 */
export interface ChatSender {
  sendMessage(text: string): Promise<void>;
}

/**
 * Last notification that was delivered in full
 */
export interface NotificationState {
  lastMessage: string | null;
  lastHomeworkId: HomeworkId;
}

export type DeliveryResult = 'sent' | 'suppressed' | 'failed';
