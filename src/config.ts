import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Credentials are read without throwing: their absence is reported
 * by the credential check at startup, after the logger is available.
 */
function getOptionalEnvVar(key: string): string | undefined {
  return process.env[key];
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

// Longest delay setTimeout honours; larger values fire after 1 ms
const MAX_TIMER_DELAY_MS = 2147483647;

/**
 * A pause in seconds that setTimeout can actually wait for
 */
function getEnvDurationSeconds(key: string, defaultValue: number): number {
  const seconds = getEnvNumber(key, defaultValue);
  const maxSeconds = Math.floor(MAX_TIMER_DELAY_MS / 1000);
  if (seconds <= 0 || seconds > maxSeconds) {
    throw new Error(`Environment variable ${key} must be greater than 0 and at most ${maxSeconds}`);
  }
  return seconds;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

export const config = {
  // Homework review API
  practicum: {
    token: getOptionalEnvVar('PRACTICUM_TOKEN'),
    endpoint: getEnvVar(
      'PRACTICUM_ENDPOINT',
      'https://practicum.yandex.ru/api/user_api/homework_statuses/'
    ),
  },

  // Telegram Configuration
  telegram: {
    botToken: getOptionalEnvVar('TELEGRAM_BOT_TOKEN'),
    chatId: getOptionalEnvVar('TELEGRAM_CHAT_ID'),

    /** Send attempts per message */
    retryAttempts: getEnvNumber('TELEGRAM_RETRY_ATTEMPTS', 1),

    /** Base delay between send attempts (ms) */
    retryDelayMs: getEnvNumber('TELEGRAM_RETRY_DELAY_MS', 1000),
  },

  // Polling Configuration
  polling: {
    /** Pause between two polls, in seconds */
    retryTimeSeconds: getEnvDurationSeconds('RETRY_TIME_SECONDS', 600),
  },

  // Logging Configuration
  logging: {
    level: getEnvVar('LOG_LEVEL', 'debug'),
    file: getEnvVar('LOG_FILE', 'logs/homework-bot.log'),
    silent: getEnvBoolean('LOG_SILENT', false),
  },
} as const;

export type Config = typeof config;
