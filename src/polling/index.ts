export { PollLoop } from './PollLoop.js';
export type {
  PollLoopConfig,
  PollState,
  StatusSource,
  Notifier,
  CycleOutcome,
  PollLoopEvents,
  Sleep,
} from './types.js';
