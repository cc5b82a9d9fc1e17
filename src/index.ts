/**
 * Homework Status Bot
 *
 * Entry point for the application.
 */

import { App } from './app.js';
import { logger, flushLogger } from './logger.js';
import { MissingVariableError } from './errors.js';

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

async function main(): Promise<void> {
  const app = new App();

  try {
    logger.info('='.repeat(50));
    logger.info('Homework Status Bot');
    logger.info('='.repeat(50));

    await app.start();
  } catch (error) {
    // Missing credentials were already reported by the startup check
    if (!(error instanceof MissingVariableError)) {
      logger.error('Failed to start application', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    await flushLogger();
    process.exit(1);
  }
}

// Run
void main();
