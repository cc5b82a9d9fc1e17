/**
 * Homework API Client
 *
 * Requests homework statuses changed since a cursor and classifies
 * the response. There is no retry here: the poll loop simply asks
 * again on its next cycle.
 */

import { logger } from '../logger.js';
import {
  BadResponseError,
  ServiceDenialError,
  ServiceUnreachableError,
} from '../errors.js';
import { isRecord } from './responseParser.js';
import { FetchTransport } from './FetchTransport.js';
import type {
  HomeworkApiClientConfig,
  HttpTransport,
  RequestParams,
  TransportResponse,
} from './types.js';

/** Body keys through which the service reports a logical refusal */
const DENIAL_KEYS = ['error', 'code'] as const;

export class HomeworkApiClient {
  private endpoint: string;
  private headers: Record<string, string>;

  constructor(
    config: HomeworkApiClientConfig,
    private transport: HttpTransport = new FetchTransport()
  ) {
    this.endpoint = config.endpoint;
    this.headers = { Authorization: `OAuth ${config.token}` };
  }

  /**
   * Fetch the statuses reported since `cursor` (Unix seconds).
   * Returns the parsed body unchanged.
   */
  async getStatuses(cursor: number): Promise<unknown> {
    const request: RequestParams = {
      url: this.endpoint,
      headers: this.headers,
      params: { from_date: cursor },
    };

    let response: TransportResponse;
    try {
      response = await this.transport.get(request);
    } catch (error) {
      throw new ServiceUnreachableError(error, request);
    }

    if (response.status !== 200) {
      throw new BadResponseError(response.status, request);
    }

    const { body } = response;
    if (isRecord(body)) {
      for (const key of DENIAL_KEYS) {
        if (key in body) {
          throw new ServiceDenialError(key, body[key], request);
        }
      }
    }

    logger.debug('Homework statuses received', { fromDate: cursor });
    return body;
  }
}
