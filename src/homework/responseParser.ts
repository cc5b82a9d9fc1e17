/**
 * Response Parser
 *
 * Pulls the homework list and the server clock out of a status response.
 */

import { InvalidShapeError, MissingFieldError } from '../errors.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Return the `homeworks` list as-is.
 * Items are validated later, when one is described.
 */
export function extractHomeworks(body: unknown): unknown[] {
  if (!isRecord(body) || !('homeworks' in body)) {
    throw new MissingFieldError('homeworks');
  }
  const { homeworks } = body;
  if (!Array.isArray(homeworks)) {
    throw new InvalidShapeError();
  }
  return homeworks;
}

/**
 * Next cursor: the server-reported `current_date`, or `fallback`
 * when the body has none
 */
export function extractCurrentDate(body: unknown, fallback: number): number {
  if (isRecord(body) && Number.isInteger(body.current_date)) {
    return Number(body.current_date);
  }
  return fallback;
}
