/**
 * Types for the homework review API
 */

// ===========================================
// Domain Types
// ===========================================

/**
 * Review verdicts the service is known to report
 */
export type VerdictCode = 'approved' | 'rejected' | 'reviewing';

/**
 * Identifier of a homework as reported by the service.
 * null when the item carries no usable id.
 */
export type HomeworkId = number | string | null;

/**
 * A homework item with a recognised verdict
 */
export interface HomeworkRecord {
  id: HomeworkId;
  name: string;
  status: VerdictCode;
}

// ===========================================
// Request / Transport Types
// ===========================================

/**
 * Everything needed to repeat (or describe) a status request
 */
export interface RequestParams {
  url: string;
  headers: Record<string, string>;
  params: Record<string, string | number>;
}

/**
 * Raw HTTP result: status code and the body parsed as JSON
 * (or the raw text when the body is not JSON)
 */
export interface TransportResponse {
  status: number;
  body: unknown;
}

/**
 * Capability to perform a GET request.
 * Rejects on network-level failures only.
 */
export interface HttpTransport {
  get(request: RequestParams): Promise<TransportResponse>;
}

/**
 * API client configuration
 */
export interface HomeworkApiClientConfig {
  endpoint: string;
  token: string;
}
