/**
 * Notification Service
 *
 * Delivers notifications to the chat and suppresses repeats:
 * a message is skipped when both its text and its homework id
 * match the last one delivered.
 *
 * State only advances after a confirmed delivery. After a failed
 * send the next identical message is delivered again.
 */

import { logger } from '../logger.js';
import type { HomeworkId } from '../homework/types.js';
import type {
  ChatSender,
  DeliveryResult,
  NotificationState,
} from './types.js';
import {
  ATTENTION_MESSAGE,
  formatDeliveryFailure,
  formatSentMessage,
} from './formatter.js';

export class NotificationService {
  private state: NotificationState = {
    lastMessage: null,
    lastHomeworkId: null,
  };

  constructor(private sender: ChatSender) {
    logger.info('Notification Service initialized');
  }

  /**
   * Notify the recipient unless this exact notification was the last one delivered.
   * Never rejects: delivery failures are logged and reported as 'failed'.
   */
  public async notify(message: string, homeworkId: HomeworkId): Promise<DeliveryResult> {
    if (this.isDuplicate(message, homeworkId)) {
      logger.debug('Notification suppressed', { homeworkId });
      return 'suppressed';
    }

    try {
      await this.sender.sendMessage(ATTENTION_MESSAGE);
      await this.sender.sendMessage(message);
    } catch (error) {
      logger.error(formatDeliveryFailure(error));
      return 'failed';
    }

    this.state = { lastMessage: message, lastHomeworkId: homeworkId };
    logger.info(formatSentMessage(message));
    return 'sent';
  }

  public getState(): NotificationState {
    return { ...this.state };
  }

  private isDuplicate(message: string, homeworkId: HomeworkId): boolean {
    return (
      message === this.state.lastMessage &&
      homeworkId === this.state.lastHomeworkId
    );
  }
}
