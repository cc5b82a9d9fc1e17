/**
 * Poll Loop
 *
 * Asks the API for status changes, turns the most recent homework
 * into a notification and pauses before asking again. Cycles run
 * strictly one after another; a failing cycle is logged, reported
 * to the chat and followed by the usual pause.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { HomeworkBotError } from '../errors.js';
import { extractCurrentDate, extractHomeworks } from '../homework/responseParser.js';
import { describeStatus, readHomeworkId } from '../homework/statusTranslator.js';
import { STATUSES_NOT_CHANGED, formatFailureMessage } from '../notification/formatter.js';
import type {
  CycleOutcome,
  Notifier,
  PollLoopConfig,
  PollLoopEvents,
  PollState,
  Sleep,
  StatusSource,
} from './types.js';

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class PollLoop extends EventEmitter<PollLoopEvents> {
  private state: PollState;
  private retryTimeMs: number;

  constructor(
    config: PollLoopConfig,
    private source: StatusSource,
    private notifier: Notifier,
    private sleep: Sleep = defaultSleep
  ) {
    super();
    this.state = { cursor: config.initialCursor, currentHomeworkId: null };
    this.retryTimeMs = config.retryTimeMs;
  }

  /**
   * Run cycles back to back, pausing after each one.
   * Without a limit this never resolves.
   */
  public async run(maxCycles = Infinity): Promise<void> {
    logger.info('Poll loop started', {
      cursor: this.state.cursor,
      retryTimeMs: this.retryTimeMs,
    });

    for (let cycle = 0; cycle < maxCycles; cycle++) {
      try {
        const outcome = await this.runCycle();
        this.emit('cycle', outcome, this.getState());
      } finally {
        await this.sleep(this.retryTimeMs);
      }
    }
  }

  /**
   * One poll. Never rejects: failures come back as a 'failed' outcome.
   */
  public async runCycle(): Promise<CycleOutcome> {
    try {
      const body = await this.source.getStatuses(this.state.cursor);
      this.state = {
        ...this.state,
        cursor: extractCurrentDate(body, this.state.cursor),
      };

      const homeworks = extractHomeworks(body);
      if (homeworks.length === 0) {
        logger.debug(STATUSES_NOT_CHANGED);
        return { kind: 'unchanged' };
      }

      // The service lists the most recent homework first
      const latest = homeworks[0];
      const homeworkId = readHomeworkId(latest);
      this.state = { ...this.state, currentHomeworkId: homeworkId };

      const message = describeStatus(latest);
      const delivery = await this.notifier.notify(message, homeworkId);
      return { kind: 'reported', homeworkId, message, delivery };
    } catch (error) {
      return this.reportFailure(error);
    }
  }

  public getState(): PollState {
    return { ...this.state };
  }

  private async reportFailure(error: unknown): Promise<CycleOutcome> {
    const message = formatFailureMessage(error);
    const failure = error instanceof Error ? error : new HomeworkBotError(String(error));
    logger.error(message, { errorType: failure.name });

    const delivery = await this.notifier.notify(message, this.state.currentHomeworkId);
    return { kind: 'failed', error: failure, message, delivery };
  }
}
