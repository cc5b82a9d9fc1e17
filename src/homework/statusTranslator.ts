/**
 * Status Translator
 *
 * Turns a homework item into the text sent to the chat.
 */

import { MissingFieldError, UnknownStatusError } from '../errors.js';
import { isRecord } from './responseParser.js';
import type { HomeworkId, HomeworkRecord, VerdictCode } from './types.js';

export const VERDICTS: Record<VerdictCode, string> = {
  approved: 'The work has been reviewed: the reviewer liked everything. Hooray!',
  rejected: 'The work has been reviewed: the reviewer has remarks.',
  reviewing: 'The work has been taken for review by the reviewer.',
};

export function isVerdictCode(value: unknown): value is VerdictCode {
  return typeof value === 'string' && Object.hasOwn(VERDICTS, value);
}

export function readHomeworkId(homework: unknown): HomeworkId {
  if (!isRecord(homework)) {
    return null;
  }
  const { id } = homework;
  return typeof id === 'number' || typeof id === 'string' ? id : null;
}

/**
 * Validate a raw item. The status is checked before the name.
 */
export function toHomeworkRecord(homework: unknown): HomeworkRecord {
  const status = isRecord(homework) ? homework.status : undefined;
  if (!isRecord(homework) || !isVerdictCode(status)) {
    throw new UnknownStatusError(status);
  }
  const name = homework.homework_name;
  if (typeof name !== 'string') {
    throw new MissingFieldError('homework_name');
  }
  return { id: readHomeworkId(homework), name, status };
}

export function describeStatus(homework: unknown): string {
  const record = toHomeworkRecord(homework);
  return `Status changed for "${record.name}". ${VERDICTS[record.status]}`;
}
