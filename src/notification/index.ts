export { NotificationService } from './NotificationService.js';
export { TelegramClient } from './TelegramClient.js';
export type { TelegramBotApi } from './TelegramClient.js';
export {
  ATTENTION_MESSAGE,
  STATUSES_NOT_CHANGED,
  formatFailureMessage,
  formatSentMessage,
  formatDeliveryFailure,
} from './formatter.js';
export type {
  TelegramClientConfig,
  ChatSender,
  NotificationState,
  DeliveryResult,
} from './types.js';
