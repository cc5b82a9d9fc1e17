/**
 * Types for the Poll Loop
 */

import type { HomeworkId } from '../homework/types.js';
import type { DeliveryResult } from '../notification/types.js';

export interface PollLoopConfig {
  /** Cursor for the first request (Unix seconds) */
  initialCursor: number;

  /** Pause after every cycle, successful or not (ms) */
  retryTimeMs: number;
}

/**
 * State carried from one cycle to the next
 */
export interface PollState {
  cursor: number;

  /** Id of the most recent homework seen; also used for failure notices */
  currentHomeworkId: HomeworkId;
}

/**
 * Source of raw status responses
 */
export interface StatusSource {
  getStatuses(cursor: number): Promise<unknown>;
}

/**
 * Notification sink that never rejects
 */
export interface Notifier {
  notify(message: string, homeworkId: HomeworkId): Promise<DeliveryResult>;
}

export type CycleOutcome =
  | {
      kind: 'reported';
      homeworkId: HomeworkId;
      message: string;
      delivery: DeliveryResult;
    }
  | { kind: 'unchanged' }
  | {
      kind: 'failed';
      error: Error;
      message: string;
      delivery: DeliveryResult;
    };

export type PollLoopEvents = {
  cycle: [outcome: CycleOutcome, state: PollState];
};

export type Sleep = (ms: number) => Promise<void>;
