/**
 * Error taxonomy
 *
 * MissingVariableError is fatal and only raised at startup.
 * CycleError subclasses are recoverable: the poll loop logs them,
 * reports them to the chat and carries on after the usual pause.
 */

import { maskSecret } from './logger.js';
import type { RequestParams } from './homework/types.js';

export class HomeworkBotError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingVariableError extends HomeworkBotError {
  constructor(public readonly variables: readonly string[]) {
    super(`Missing required environment variables: ${variables.join(', ')}. Bot launch stopped.`);
  }
}

/**
 * Base for failures that end a single poll cycle
 */
export abstract class CycleError extends HomeworkBotError {}

export class ServiceUnreachableError extends CycleError {
  constructor(cause: unknown, public readonly request: RequestParams) {
    super(
      `API service is unreachable: ${describeCause(cause)}. Request parameters: ${describeRequest(request)}.`,
      { cause }
    );
  }
}

export class BadResponseError extends CycleError {
  constructor(public readonly statusCode: number, public readonly request: RequestParams) {
    super(`API response code: ${statusCode}. Request parameters: ${describeRequest(request)}.`);
  }
}

export class ServiceDenialError extends CycleError {
  constructor(
    public readonly key: string,
    public readonly value: unknown,
    public readonly request: RequestParams
  ) {
    super(
      `Service denial. Key: ${key}. Error: ${describeValue(value)}. Request parameters: ${describeRequest(request)}.`
    );
  }
}

export class MissingFieldError extends CycleError {
  constructor(public readonly key: string) {
    super(`Required key "${key}" is absent in API response.`);
  }
}

export class InvalidShapeError extends CycleError {
  constructor() {
    super('Homeworks are not a list.');
  }
}

export class UnknownStatusError extends CycleError {
  constructor(public readonly status: unknown) {
    super(`Unexpected homework status: ${describeValue(status)}.`);
  }
}

/**
 * Chat delivery failure; handled inside the notifier, never by the loop
 */
export class NotificationDeliveryError extends HomeworkBotError {
  constructor(cause: unknown) {
    super(describeCause(cause), { cause });
  }
}

/**
 * Render request parameters for diagnostics, with header values masked
 */
export function describeRequest(request: RequestParams): string {
  const headers = Object.fromEntries(
    Object.entries(request.headers).map(([name, value]) => [name, maskSecret(value)])
  );
  return `${request.url}, ${JSON.stringify(headers)}, ${JSON.stringify(request.params)}`;
}

const MAX_CAUSE_DEPTH = 5;

/**
 * Error text followed by its nested causes, e.g.
 * `fetch failed (connect ECONNREFUSED 127.0.0.1:1)`.
 * Messages of this project's own errors already describe their cause.
 */
export function describeCause(cause: unknown, depth = 0): string {
  if (!(cause instanceof Error)) {
    return String(cause);
  }
  if (cause instanceof HomeworkBotError || cause.cause === undefined || depth >= MAX_CAUSE_DEPTH) {
    return cause.message;
  }
  return `${cause.message} (${describeCause(cause.cause, depth + 1)})`;
}

function describeValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
