/**
 * Fetch Transport
 *
 * GET over the global fetch. No timeout is applied: a request that
 * never settles blocks its caller.
 */

import type { HttpTransport, RequestParams, TransportResponse } from './types.js';

export class FetchTransport implements HttpTransport {
  async get(request: RequestParams): Promise<TransportResponse> {
    const url = new URL(request.url);
    for (const [key, value] of Object.entries(request.params)) {
      url.searchParams.set(key, String(value));
    }

    const res = await fetch(url, {
      method: 'GET',
      headers: request.headers,
    });

    return { status: res.status, body: parseBody(await res.text()) };
  }
}

/**
 * Parse a JSON body, falling back to the raw text
 */
function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
